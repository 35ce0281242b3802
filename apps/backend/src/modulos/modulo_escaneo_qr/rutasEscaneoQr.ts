/**
 * Rutas de escaneo QR.
 */
import express, { Router } from 'express';
import { configuracion } from '../../configuracion';
import { validarCuerpo } from '../../compartido/validaciones/validar';
import { crearControladorEscaneoQr } from './controladorEscaneoQr';
import type { ServicioEscaneoQr } from './servicioEscaneoQr';
import { esquemaDecodificarBase64, esquemaDecodificarLote, esquemaInfoDatos } from './validacionesEscaneoQr';

export function crearRutasEscaneoQr(servicio: ServicioEscaneoQr) {
  const router = Router();
  const controlador = crearControladorEscaneoQr(servicio);

  router.post(
    '/decodificar',
    express.raw({ type: ['image/*', 'application/octet-stream'], limit: configuracion.limiteImagenBytes }),
    controlador.decodificarArchivo
  );
  router.post('/decodificar-base64', validarCuerpo(esquemaDecodificarBase64), controlador.decodificarBase64);
  router.post('/decodificar-lote', validarCuerpo(esquemaDecodificarLote), controlador.decodificarLote);
  router.post('/info', validarCuerpo(esquemaInfoDatos), controlador.info);

  return router;
}
