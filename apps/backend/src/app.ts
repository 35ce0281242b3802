/**
 * Crea la app HTTP (Express) del API de QR.
 *
 * Principios:
 * - Seguridad por defecto (cabeceras, CORS acotado, limite de tasa por plan)
 * - Validación en modulos (Zod) y error envelope consistente
 * - Sin side-effects al importar (fácil de testear)
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import { configuracion } from './configuracion';
import { ENDPOINTS_LIMITADOS, crearRouterApi } from './rutas';
import { manejadorErrores } from './compartido/errores/manejadorErrores';
import {
  middlewareIdentidad,
  resolutorIdentidadCabeceras,
  type ResolutorIdentidad
} from './compartido/identidad/resolutorIdentidad';
import { middlewareIdSolicitud, middlewareRegistroSolicitud } from './compartido/observabilidad/middlewareObservabilidad';
import { crearMotoresPorDefecto } from './modulos/modulo_escaneo_qr/motores/registroMotores';
import { PipelineDecodificacion } from './modulos/modulo_escaneo_qr/pipelineDecodificacion';
import { ServicioEscaneoQr } from './modulos/modulo_escaneo_qr/servicioEscaneoQr';
import { AlmacenContadoresMemoria } from './modulos/modulo_limite_tasa/almacenContadoresMemoria';
import { LimitadorTasa } from './modulos/modulo_limite_tasa/limitadorTasa';
import { middlewareLimiteTasa } from './modulos/modulo_limite_tasa/middlewareLimiteTasa';

export type OpcionesApp = {
  limitador?: LimitadorTasa;
  servicioEscaneo?: ServicioEscaneoQr;
  resolutorIdentidad?: ResolutorIdentidad;
  /** Por defecto `configuracion.rateLimitHabilitado`. */
  limiteTasaHabilitado?: boolean;
};

export function crearServicioEscaneoPorDefecto() {
  const pipeline = new PipelineDecodificacion(crearMotoresPorDefecto(configuracion.qrMotores), {
    pasadasExtendidas: configuracion.qrDecodePasadasExtendidas
  });
  return new ServicioEscaneoQr(pipeline);
}

export function crearApp(opciones: OpcionesApp = {}) {
  const limitador =
    opciones.limitador ?? new LimitadorTasa(new AlmacenContadoresMemoria(), { prefijo: configuracion.rateLimitPrefijo });
  const servicioEscaneo = opciones.servicioEscaneo ?? crearServicioEscaneoPorDefecto();
  const limiteTasaHabilitado = opciones.limiteTasaHabilitado ?? configuracion.rateLimitHabilitado;

  const app = express();

  // Reduce leakage de informacion sobre la tecnologia del servidor.
  app.disable('x-powered-by');

  app.use(helmet());
  app.use(
    cors({
      origin: configuracion.corsOrigenes,
      credentials: true,
      // El cliente necesita leer los contadores para mostrar el consumo del plan.
      exposedHeaders: [
        'Retry-After',
        'X-RateLimit-Limit',
        'X-RateLimit-Remaining',
        'X-RateLimit-Reset',
        'X-RateLimit-Status'
      ]
    })
  );
  app.use(express.json({ limit: configuracion.limiteJson }));
  app.use(middlewareIdSolicitud);
  app.use(middlewareIdentidad(opciones.resolutorIdentidad ?? resolutorIdentidadCabeceras));
  app.use(middlewareRegistroSolicitud);
  if (limiteTasaHabilitado) {
    app.use(middlewareLimiteTasa(limitador, { endpointsConocidos: ENDPOINTS_LIMITADOS }));
  }

  app.use('/api', crearRouterApi({ limitador, servicioEscaneo }));

  app.use(manejadorErrores);

  return app;
}
