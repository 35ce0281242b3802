/**
 * Registro central de rutas del API de QR.
 *
 * Convenciones:
 * - Salud y metricas no pasan por el limite de tasa (ver `middlewareLimiteTasa`).
 * - Las dependencias con estado (limitador, servicio de escaneo) llegan desde
 *   `crearApp` para que las pruebas puedan sustituirlas.
 */
import { Router } from 'express';
import { crearRutasSalud } from './compartido/salud/rutasSalud';
import { exportarMetricasPrometheus } from './compartido/observabilidad/metrics';
import { crearRutasDisenoQr } from './modulos/modulo_diseno_qr/rutasDisenoQr';
import { crearRutasEscaneoQr } from './modulos/modulo_escaneo_qr/rutasEscaneoQr';
import type { ServicioEscaneoQr } from './modulos/modulo_escaneo_qr/servicioEscaneoQr';
import type { LimitadorTasa } from './modulos/modulo_limite_tasa/limitadorTasa';
import type { EndpointLimitado } from './modulos/modulo_limite_tasa/middlewareLimiteTasa';
import { crearRutasLimiteTasa } from './modulos/modulo_limite_tasa/rutasLimiteTasa';

export type DependenciasApi = {
  limitador: LimitadorTasa;
  servicioEscaneo: ServicioEscaneoQr;
};

/**
 * Endpoints que cuentan cada uno en su propio contador de limite de tasa.
 * Debe coincidir con lo que montan los routers de abajo.
 */
export const ENDPOINTS_LIMITADOS: readonly EndpointLimitado[] = [
  { metodo: 'POST', ruta: '/api/qr/decodificar' },
  { metodo: 'POST', ruta: '/api/qr/decodificar-base64' },
  { metodo: 'POST', ruta: '/api/qr/decodificar-lote' },
  { metodo: 'POST', ruta: '/api/qr/info' },
  { metodo: 'POST', ruta: '/api/disenador/disenar' },
  { metodo: 'POST', ruta: '/api/disenador/vista-previa' },
  { metodo: 'GET', ruta: '/api/disenador/png' },
  { metodo: 'GET', ruta: '/api/disenador/estilos' },
  { metodo: 'GET', ruta: '/api/disenador/plantillas' },
  { metodo: 'GET', ruta: '/api/limites/uso' },
  { metodo: 'GET', ruta: '/api/limites/planes' },
  { metodo: 'POST', ruta: '/api/limites/reiniciar' },
  { metodo: 'GET', ruta: '/api/limites/estado' }
];

export function crearRouterApi({ limitador, servicioEscaneo }: DependenciasApi) {
  const router = Router();

  router.use('/salud', crearRutasSalud(limitador));
  router.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(exportarMetricasPrometheus());
  });

  router.use('/qr', crearRutasEscaneoQr(servicioEscaneo));
  router.use('/disenador', crearRutasDisenoQr());
  router.use('/limites', crearRutasLimiteTasa(limitador));

  return router;
}
