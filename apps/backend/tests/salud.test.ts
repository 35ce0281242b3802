/**
 * salud.test
 *
 * Responsabilidad: Endpoints de salud y metricas.
 * Limites: Mantener contrato y comportamiento observable del modulo.
 */
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { crearApp } from '../src/app';
import type { AlmacenContadores } from '../src/modulos/modulo_limite_tasa/almacenContadores';
import { ErrorAlmacenNoDisponible } from '../src/modulos/modulo_limite_tasa/almacenContadores';
import { LimitadorTasa } from '../src/modulos/modulo_limite_tasa/limitadorTasa';

function limitadorCaido() {
  const fallar = async (): Promise<never> => {
    throw new ErrorAlmacenNoDisponible('sin conexion');
  };
  const almacen: AlmacenContadores = {
    tipo: 'redis',
    consumir: fallar,
    leer: fallar,
    eliminarPorPrefijo: fallar,
    ping: async () => false
  };
  return new LimitadorTasa(almacen);
}

describe('salud', () => {
  it('responde con estado ok y el almacen de limites', async () => {
    const app = crearApp();
    const respuesta = await request(app).get('/api/salud').expect(200);

    expect(respuesta.body.estado).toBe('ok');
    expect(respuesta.body.almacenLimites).toEqual({ tipo: 'memoria', conectado: true });
    expect(respuesta.body.tiempoActivo).toEqual(expect.any(Number));
  });

  it('expone liveness y readiness', async () => {
    const app = crearApp();
    const live = await request(app).get('/api/salud/live').expect(200);
    expect(live.body).toEqual(
      expect.objectContaining({
        estado: 'ok',
        servicio: 'api-qr',
        env: 'test'
      })
    );

    const ready = await request(app).get('/api/salud/ready').expect(200);
    expect(ready.body.dependencias).toEqual({ almacenLimites: { tipo: 'memoria', conectado: true, lista: true } });
  });

  it('readiness responde 503 con el almacen caido', async () => {
    const app = crearApp({ limitador: limitadorCaido() });
    const ready = await request(app).get('/api/salud/ready').expect(503);
    expect(ready.body.estado).toBe('degradado');
    expect(ready.body.dependencias.almacenLimites).toEqual({ tipo: 'redis', conectado: false, lista: false });

    const salud = await request(app).get('/api/salud').expect(200);
    expect(salud.body.estado).toBe('degradado');
  });

  it('expone métricas en formato texto', async () => {
    const app = crearApp();
    await request(app).get('/api/salud/live').expect(200);
    const res = await request(app).get('/api/salud/metrics').expect(200);
    expect(res.headers['content-type']).toContain('text/plain');
    expect(res.text).toContain('# TYPE qrapi_http_requests_total counter');
    expect(res.text).toContain('qrapi_rate_limit_store_up 1');
  });

  it('expone alias de métricas en /api/metrics', async () => {
    const app = crearApp();
    const res = await request(app).get('/api/metrics').expect(200);
    expect(String(res.headers['content-type'] || '')).toContain('text/plain');
    expect(res.text).toContain('# TYPE qrapi_decode_total counter');
    expect(res.text).toContain('# TYPE qrapi_rate_limit_fail_open_total counter');
  });

  it('salud y metricas no consumen el limite de tasa', async () => {
    const app = crearApp({ limiteTasaHabilitado: true });
    for (let i = 0; i < 12; i += 1) {
      const res = await request(app).get('/api/salud/live').expect(200);
      expect(res.headers['x-ratelimit-limit']).toBeUndefined();
    }
  });
});
