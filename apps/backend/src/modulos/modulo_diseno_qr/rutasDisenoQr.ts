/**
 * Rutas del diseñador de QR.
 */
import { Router } from 'express';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import { crearControladorDisenoQr } from './controladorDisenoQr';
import { esquemaDisenarQr, esquemaVistaPrevia } from './validacionesDisenoQr';

export function crearRutasDisenoQr() {
  const router = Router();
  const controlador = crearControladorDisenoQr();

  router.post('/disenar', validarCuerpo(esquemaDisenarQr), controlador.disenar);
  router.post('/vista-previa', validarCuerpo(esquemaVistaPrevia), controlador.vistaPrevia);
  router.get('/png', controlador.png);
  router.get('/estilos', controlador.estilos);
  router.get('/plantillas', controlador.plantillas);

  return router;
}
