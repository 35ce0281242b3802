/**
 * limiteTasa.limitador.test
 *
 * Responsabilidad: Ventanas fijas por plan, precedencia de bloqueo, atomicidad
 * en memoria y degradacion "fail open".
 */
import { describe, expect, it } from 'vitest';
import type { AlmacenContadores } from '../src/modulos/modulo_limite_tasa/almacenContadores';
import { ErrorAlmacenNoDisponible } from '../src/modulos/modulo_limite_tasa/almacenContadores';
import { AlmacenContadoresMemoria } from '../src/modulos/modulo_limite_tasa/almacenContadoresMemoria';
import { LimitadorTasa } from '../src/modulos/modulo_limite_tasa/limitadorTasa';
import { describirPlan, normalizarPlan, obtenerLimitesPlan } from '../src/modulos/modulo_limite_tasa/politicaPlanes';

// 2023-11-14T22:13:20Z; la ventana de minuto termina en 1700000040.
const AHORA_MS = 1_700_000_000_000;

function crearLimitador(reloj: () => number = () => AHORA_MS) {
  return new LimitadorTasa(new AlmacenContadoresMemoria(reloj), { prefijo: 'rl', reloj });
}

describe('politicaPlanes', () => {
  it('trata planes desconocidos como free', () => {
    expect(normalizarPlan('PRO')).toBe('pro');
    expect(normalizarPlan('platino')).toBe('free');
    expect(normalizarPlan(undefined)).toBe('free');
    expect(obtenerLimitesPlan('platino')).toEqual({ per_minute: 10, per_hour: 100, per_day: 1000 });
    expect(obtenerLimitesPlan('enterprise')).toEqual({ per_minute: 300, per_hour: 20000, per_day: 200000 });
    expect(describirPlan('platino')).toBe('Plan desconocido');
  });
});

describe('LimitadorTasa', () => {
  it('construye claves por ventana, cubeta y endpoint', () => {
    const limitador = crearLimitador();
    expect(limitador.construirClave('user:ana', 'minute', 1_700_000_000)).toBe('rl:user%3Aana:minute:28333333');
    expect(limitador.construirClave('ip:10.0.0.1', 'day', 1_700_000_000, '/api/qr/info')).toBe(
      'rl:ip%3A10.0.0.1:day:19675:/api/qr/info'
    );
    expect(limitador.construirClave('user:50%', 'hour', 1_700_000_000)).toBe('rl:user%3A50%25:hour:472222');
  });

  it('admite 10 por minuto en free y bloquea la 11a con datos de reintento', async () => {
    const limitador = crearLimitador();
    const primera = await limitador.verificar('user:ana', 'free');
    expect(primera).toEqual({
      permitido: true,
      tipoLimite: 'minute',
      limite: 10,
      restantes: 9,
      reinicio: 1_700_000_040,
      reintentarEn: null,
      conteos: { minute: 1, hour: 1, day: 1 }
    });
    for (let i = 0; i < 9; i += 1) {
      expect((await limitador.verificar('user:ana', 'free')).permitido).toBe(true);
    }

    expect(await limitador.verificar('user:ana', 'free')).toEqual({
      permitido: false,
      tipoLimite: 'minute',
      limite: 10,
      restantes: 0,
      reinicio: 1_700_000_040,
      reintentarEn: 40
    });
  });

  it('solicitudes concurrentes no rebasan el tope', async () => {
    const limitador = crearLimitador();
    const decisiones = await Promise.all(
      Array.from({ length: 25 }, () => limitador.verificar('user:concurrente', 'free'))
    );
    expect(decisiones.filter((d) => d.permitido)).toHaveLength(10);
  });

  it('reporta la ventana de hora cuando el minuto sigue libre', async () => {
    // Inicio exacto de una hora: 472222 * 3600.
    const inicioHoraSeg = 1_699_999_200;
    let ahoraMs = inicioHoraSeg * 1000;
    const limitador = crearLimitador(() => ahoraMs);

    for (let minuto = 0; minuto < 10; minuto += 1) {
      ahoraMs = (inicioHoraSeg + minuto * 60) * 1000;
      for (let i = 0; i < 10; i += 1) {
        expect((await limitador.verificar('user:horas', 'free')).permitido).toBe(true);
      }
    }

    ahoraMs = (inicioHoraSeg + 600) * 1000;
    const bloqueo = await limitador.verificar('user:horas', 'free');
    expect(bloqueo).toEqual(
      expect.objectContaining({ permitido: false, tipoLimite: 'hour', limite: 100, reintentarEn: 3000 })
    );
  });

  it('cuenta por separado cada endpoint e identificador', async () => {
    const limitador = crearLimitador();
    for (let i = 0; i < 10; i += 1) await limitador.verificar('user:ana', 'free', '/api/qr/info');
    expect((await limitador.verificar('user:ana', 'free', '/api/qr/info')).permitido).toBe(false);
    expect((await limitador.verificar('user:ana', 'free', '/api/disenador/estilos')).permitido).toBe(true);
    expect((await limitador.verificar('user:beto', 'free', '/api/qr/info')).permitido).toBe(true);
  });

  it('permite la solicitud si el almacen falla', async () => {
    const almacenCaido: AlmacenContadores = {
      tipo: 'redis',
      consumir: async () => {
        throw new ErrorAlmacenNoDisponible('sin conexion');
      },
      leer: async () => {
        throw new ErrorAlmacenNoDisponible('sin conexion');
      },
      eliminarPorPrefijo: async () => {
        throw new ErrorAlmacenNoDisponible('sin conexion');
      },
      ping: async () => false
    };
    const limitador = new LimitadorTasa(almacenCaido, { reloj: () => AHORA_MS });

    expect(await limitador.verificar('user:ana', 'pro')).toEqual({
      permitido: true,
      tipoLimite: 'minute',
      limite: 60,
      restantes: 60,
      reinicio: 1_700_000_040,
      reintentarEn: null,
      limitacionDeshabilitada: true
    });
    expect(await limitador.reiniciar('user:ana')).toBe(false);
    expect(await limitador.estaDisponible()).toBe(false);
    await expect(limitador.estadisticasUso('user:ana')).rejects.toBeInstanceOf(ErrorAlmacenNoDisponible);
  });

  it('reiniciar borra todas las ventanas y endpoints del identificador', async () => {
    const limitador = crearLimitador();
    for (let i = 0; i < 10; i += 1) await limitador.verificar('user:ana', 'free');
    await limitador.verificar('user:ana', 'free', '/api/qr/info');
    await limitador.verificar('user:anabel', 'free');

    expect(await limitador.reiniciar('user:ana')).toBe(true);
    expect((await limitador.verificar('user:ana', 'free')).conteos).toEqual({ minute: 1, hour: 1, day: 1 });
    // Un identificador que solo comparte prefijo no se toca.
    expect((await limitador.estadisticasUso('user:anabel')).usoActual).toEqual({ minute: 1, hour: 1, day: 1 });
  });

  it('el almacen en memoria barre las claves de quien no regresa', async () => {
    let ahoraMs = AHORA_MS;
    const reloj = () => ahoraMs;
    const almacen = new AlmacenContadoresMemoria(reloj);
    const limitador = new LimitadorTasa(almacen, { prefijo: 'rl', reloj });

    for (let i = 0; i < 50; i += 1) await limitador.verificar(`ip:10.0.0.${i}`, 'free');
    expect(almacen.tamano).toBe(150);

    // Expiran las 50 claves de minuto; quedan hora y dia.
    ahoraMs = AHORA_MS + 60_000;
    await limitador.verificar('ip:10.0.1.1', 'free');
    expect(almacen.tamano).toBe(103);

    // Un dia despues solo sobrevive la clave de dia de 10.0.1.1 y las 3 nuevas.
    ahoraMs = AHORA_MS + 86_400_000;
    await limitador.verificar('ip:10.0.1.1', 'free');
    expect(almacen.tamano).toBe(4);
  });

  it('reiniciar no toca identificadores que contienen al reiniciado', async () => {
    const limitador = crearLimitador();
    await limitador.verificar('ip:::1', 'free');
    await limitador.verificar('ip:::1:2', 'free');
    await limitador.verificar('user:a', 'free');
    await limitador.verificar('user:a:minute:28333333', 'free');

    expect(await limitador.reiniciar('ip:::1')).toBe(true);
    expect(await limitador.reiniciar('user:a')).toBe(true);

    expect((await limitador.estadisticasUso('ip:::1')).usoActual).toEqual({ minute: 0, hour: 0, day: 0 });
    expect((await limitador.estadisticasUso('ip:::1:2')).usoActual).toEqual({ minute: 1, hour: 1, day: 1 });
    expect((await limitador.estadisticasUso('user:a:minute:28333333')).usoActual).toEqual({
      minute: 1,
      hour: 1,
      day: 1
    });
  });

  it('estadisticas de uso por ventana, con y sin endpoint', async () => {
    const limitador = crearLimitador();
    for (let i = 0; i < 3; i += 1) await limitador.verificar('user:ana', 'pro');
    await limitador.verificar('user:ana', 'pro', '/api/qr/info');

    expect(await limitador.estadisticasUso('user:ana', 'pro')).toEqual({
      plan: 'pro',
      limites: { per_minute: 60, per_hour: 1000, per_day: 10000 },
      usoActual: { minute: 3, hour: 3, day: 3 },
      restantes: { minute: 57, hour: 997, day: 9997 },
      reinicios: { minute: 1_700_000_040, hour: 1_700_002_800, day: 1_700_006_400 }
    });
    expect((await limitador.estadisticasUso('user:ana', 'pro', '/api/qr/info')).usoActual).toEqual({
      minute: 1,
      hour: 1,
      day: 1
    });
  });

  it('los contadores expiran con la ventana', async () => {
    let ahoraMs = AHORA_MS;
    const limitador = crearLimitador(() => ahoraMs);
    for (let i = 0; i < 10; i += 1) await limitador.verificar('user:ana', 'free');
    expect((await limitador.verificar('user:ana', 'free')).permitido).toBe(false);

    ahoraMs = 1_700_000_040_000;
    expect(await limitador.verificar('user:ana', 'free')).toEqual(
      expect.objectContaining({ permitido: true, conteos: { minute: 1, hour: 11, day: 11 } })
    );
  });
});
