/**
 * Endpoints de salud para monitoreo del API y del almacen de limites.
 *
 * `/ready` responde 503 cuando el almacen de contadores no contesta; el API
 * sigue atendiendo (los limites operan en modo "fail open") pero el
 * balanceador puede preferir otra instancia.
 */
import { Router } from 'express';
import type { LimitadorTasa } from '../../modulos/modulo_limite_tasa/limitadorTasa';
import { exportarMetricasPrometheus } from '../observabilidad/metrics';
import type { EstadoAlmacen, RespuestaLiveness, RespuestaReadiness, RespuestaSalud } from '../tipos/observabilidad';

async function estadoAlmacen(limitador: LimitadorTasa): Promise<EstadoAlmacen> {
  return { tipo: limitador.tipoAlmacen, conectado: await limitador.estaDisponible() };
}

export function crearRutasSalud(limitador: LimitadorTasa) {
  const router = Router();

  router.get('/', async (_req, res) => {
    const almacen = await estadoAlmacen(limitador);
    const payload: RespuestaSalud & { almacenLimites: EstadoAlmacen } = {
      estado: almacen.conectado ? 'ok' : 'degradado',
      tiempoActivo: process.uptime(),
      almacenLimites: almacen
    };
    res.json(payload);
  });

  router.get('/live', (_req, res) => {
    const payload: RespuestaLiveness = {
      estado: 'ok',
      tiempoActivo: process.uptime(),
      servicio: 'api-qr',
      env: process.env.NODE_ENV ?? 'development'
    };
    res.json(payload);
  });

  router.get('/ready', async (_req, res) => {
    const almacen = await estadoAlmacen(limitador);
    const payload: RespuestaReadiness = {
      estado: almacen.conectado ? 'ok' : 'degradado',
      tiempoActivo: process.uptime(),
      dependencias: {
        almacenLimites: { ...almacen, lista: almacen.conectado }
      }
    };
    res.status(almacen.conectado ? 200 : 503).json(payload);
  });

  router.get('/metrics', async (_req, res) => {
    const almacen = await estadoAlmacen(limitador);
    const payload = `${exportarMetricasPrometheus()}\n\n# HELP qrapi_rate_limit_store_up Almacen de limites disponible (1) o caido (0)\n# TYPE qrapi_rate_limit_store_up gauge\nqrapi_rate_limit_store_up ${almacen.conectado ? 1 : 0}\n`;
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(payload);
  });

  return router;
}
