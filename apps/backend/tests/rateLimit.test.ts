/**
 * rateLimit.test
 *
 * Responsabilidad: Limites por plan en el borde HTTP y endpoints de consulta.
 * Limites: Cabeceras X-RateLimit-* y envelope 429 son contrato publico.
 */
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { crearApp } from '../src/app';
import type { AlmacenContadores } from '../src/modulos/modulo_limite_tasa/almacenContadores';
import { ErrorAlmacenNoDisponible } from '../src/modulos/modulo_limite_tasa/almacenContadores';
import { AlmacenContadoresMemoria } from '../src/modulos/modulo_limite_tasa/almacenContadoresMemoria';
import { LimitadorTasa } from '../src/modulos/modulo_limite_tasa/limitadorTasa';
import { normalizarRuta } from '../src/modulos/modulo_limite_tasa/middlewareLimiteTasa';
import { ENDPOINTS_LIMITADOS } from '../src/rutas';

const AHORA_MS = 1_700_000_000_000;

function crearAppConReloj() {
  const reloj = () => AHORA_MS;
  const limitador = new LimitadorTasa(new AlmacenContadoresMemoria(reloj), { reloj });
  return crearApp({ limitador, limiteTasaHabilitado: true });
}

describe('rate limit', () => {
  it('responde 429 al exceder el limite por minuto del plan free', async () => {
    const app = crearAppConReloj();

    const primera = await request(app).get('/api/disenador/estilos').set('x-usuario-id', 'ana').expect(200);
    expect(primera.headers['x-ratelimit-limit']).toBe('10');
    expect(primera.headers['x-ratelimit-remaining']).toBe('9');
    expect(primera.headers['x-ratelimit-reset']).toBe('1700000040');
    expect(primera.headers['x-ratelimit-count-minute']).toBe('1');

    for (let i = 0; i < 9; i += 1) {
      await request(app).get('/api/disenador/estilos').set('x-usuario-id', 'ana').expect(200);
    }

    const respuesta = await request(app).get('/api/disenador/estilos').set('x-usuario-id', 'ana').expect(429);
    expect(respuesta.headers['retry-after']).toBe('40');
    expect(respuesta.headers['x-ratelimit-remaining']).toBe('0');
    expect(respuesta.body).toEqual({
      error: {
        codigo: 'LIMITE_TASA_EXCEDIDO',
        mensaje: 'Demasiadas solicitudes. Limite: 10 solicitudes por minute',
        detalles: { tipoLimite: 'minute', limite: 10, reintentarEn: 40, reinicio: 1_700_000_040 }
      }
    });
  });

  it('aplica el plan enviado por el gateway solo con usuario', async () => {
    const app = crearAppConReloj();
    const pro = await request(app)
      .get('/api/disenador/estilos')
      .set('x-usuario-id', 'ana')
      .set('x-usuario-plan', 'pro')
      .expect(200);
    expect(pro.headers['x-ratelimit-limit']).toBe('60');

    const anonimo = await request(app).get('/api/disenador/estilos').set('x-usuario-plan', 'enterprise').expect(200);
    expect(anonimo.headers['x-ratelimit-limit']).toBe('10');
  });

  it('con el almacen caido deja pasar y lo anuncia en cabeceras', async () => {
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
    const app = crearApp({ limitador: new LimitadorTasa(almacen), limiteTasaHabilitado: true });

    const res = await request(app).get('/api/disenador/estilos').expect(200);
    expect(res.headers['x-ratelimit-status']).toBe('disabled');
    expect(res.headers['x-ratelimit-reason']).toBe('store-unavailable');
    expect(res.headers['x-ratelimit-limit']).toBeUndefined();

    const uso = await request(app).get('/api/limites/uso').set('x-usuario-id', 'ana').expect(503);
    expect(uso.body.error.codigo).toBe('LIMITES_NO_DISPONIBLE');
  });
});

describe('contador por ruta', () => {
  it('normaliza mayusculas, barras repetidas, barra final y query', () => {
    expect(normalizarRuta('/API//Disenador///estilos/?x=1')).toBe('/api/disenador/estilos');
    expect(normalizarRuta('/?a=1')).toBe('/');
    expect(normalizarRuta('')).toBe('/');
  });

  it('las variantes de una misma ruta comparten contador', async () => {
    const app = crearAppConReloj();
    const variantes = ['/API/disenador/estilos', '/api/disenador/estilos/', '/api/Disenador/estilos', '/api/disenador/Estilos'];

    const conteos: string[] = [];
    for (let i = 0; i < 10; i += 1) {
      const res = await request(app).get(variantes[i % variantes.length]).set('x-usuario-id', 'ana').expect(200);
      conteos.push(String(res.headers['x-ratelimit-count-minute']));
    }
    expect(conteos).toEqual(['1', '2', '3', '4', '5', '6', '7', '8', '9', '10']);

    const bloqueada = await request(app).get('/API/DISENADOR/ESTILOS/').set('x-usuario-id', 'ana').expect(429);
    expect(bloqueada.body.error.codigo).toBe('LIMITE_TASA_EXCEDIDO');

    const uso = await request(app)
      .get('/api/limites/uso')
      .query({ endpoint: '/api/Disenador/Estilos/' })
      .set('x-usuario-id', 'ana')
      .expect(200);
    expect(uso.body.endpoint).toBe('/api/disenador/estilos');
    expect(uso.body.estadisticas.usoActual).toEqual({ minute: 10, hour: 10, day: 10 });
  });

  it('rutas que no existen comparten una sola cubeta', async () => {
    const app = crearAppConReloj();
    for (let i = 0; i < 10; i += 1) {
      await request(app).get(`/api/no-existe-${i}`).set('x-usuario-id', 'ana').expect(404);
    }
    await request(app).get('/api/otra-ruta').set('x-usuario-id', 'ana').expect(429);
    await request(app).get('/api/disenador/estilos').set('x-usuario-id', 'ana').expect(200);
  });

  it('salud en mayusculas sigue fuera del limite', async () => {
    const app = crearAppConReloj();
    const res = await request(app).get('/API/Salud/live').set('x-usuario-id', 'ana').expect(200);
    expect(res.headers['x-ratelimit-limit']).toBeUndefined();
  });

  it('cada endpoint limitado existe en el router', async () => {
    const app = crearApp({ limiteTasaHabilitado: false });
    for (const { metodo, ruta } of ENDPOINTS_LIMITADOS) {
      const res = metodo === 'GET' ? await request(app).get(ruta) : await request(app).post(ruta);
      expect(res.status, `${metodo} ${ruta}`).not.toBe(404);
    }
  });
});

describe('endpoints de limites', () => {
  it('requiere usuario para consultar uso y planes', async () => {
    const app = crearAppConReloj();
    const res = await request(app).get('/api/limites/planes').expect(401);
    expect(res.body).toEqual({ error: { codigo: 'NO_AUTORIZADO', mensaje: 'Se requiere un usuario autenticado' } });
  });

  it('describe el plan del usuario', async () => {
    const app = crearAppConReloj();
    const res = await request(app)
      .get('/api/limites/planes')
      .set('x-usuario-id', 'ana')
      .set('x-usuario-plan', 'business')
      .expect(200);
    expect(res.body).toEqual({
      plan: 'business',
      limites: { per_minute: 120, per_hour: 5000, per_day: 50000 },
      descripcion: 'Plan business con limites altos para negocios en crecimiento'
    });
  });

  it('reporta el uso por endpoint', async () => {
    const app = crearAppConReloj();
    await request(app).get('/api/disenador/estilos').set('x-usuario-id', 'ana').expect(200);
    await request(app).get('/api/disenador/estilos').set('x-usuario-id', 'ana').expect(200);

    const res = await request(app)
      .get('/api/limites/uso')
      .query({ endpoint: '/api/disenador/estilos' })
      .set('x-usuario-id', 'ana')
      .expect(200);

    expect(res.body.usuarioId).toBe('ana');
    expect(res.body.plan).toBe('free');
    expect(res.body.endpoint).toBe('/api/disenador/estilos');
    expect(res.body.estadisticas.usoActual).toEqual({ minute: 2, hour: 2, day: 2 });
    expect(res.body.estadisticas.restantes).toEqual({ minute: 8, hour: 98, day: 998 });
  });

  it('solo enterprise puede reiniciar sus contadores', async () => {
    const app = crearAppConReloj();
    const prohibido = await request(app).post('/api/limites/reiniciar').set('x-usuario-id', 'ana').expect(403);
    expect(prohibido.body.error.codigo).toBe('PROHIBIDO');

    await request(app)
      .get('/api/disenador/estilos')
      .set('x-usuario-id', 'corp')
      .set('x-usuario-plan', 'enterprise')
      .expect(200);
    const ok = await request(app)
      .post('/api/limites/reiniciar')
      .set('x-usuario-id', 'corp')
      .set('x-usuario-plan', 'enterprise')
      .expect(200);
    expect(ok.body).toEqual({ mensaje: 'Limites reiniciados' });

    const uso = await request(app)
      .get('/api/limites/uso')
      .query({ endpoint: '/api/disenador/estilos' })
      .set('x-usuario-id', 'corp')
      .set('x-usuario-plan', 'enterprise')
      .expect(200);
    expect(uso.body.estadisticas.usoActual).toEqual({ minute: 0, hour: 0, day: 0 });
  });

  it('estado del servicio de limites', async () => {
    const app = crearAppConReloj();
    const res = await request(app).get('/api/limites/estado').expect(200);
    expect(res.body).toEqual({
      estadoServicio: 'disponible',
      almacen: 'memoria',
      almacenConectado: true,
      mensaje: 'Servicio de limites operativo'
    });
  });
});
