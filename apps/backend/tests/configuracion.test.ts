/**
 * configuracion.test
 *
 * Responsabilidad: Defaults y parseo de variables de entorno.
 * Limites: Mantener contrato y comportamiento observable del modulo.
 */
import { afterEach, describe, expect, it, vi } from 'vitest';
import { configuracion, parsearNumeroSeguro } from '../src/configuracion';

const backup = { ...process.env };

describe('configuracion', () => {
  afterEach(() => {
    for (const key of Object.keys(process.env)) delete process.env[key];
    Object.assign(process.env, backup);
    vi.resetModules();
  });

  it('expone valores basicos esperados', () => {
    expect(configuracion.puerto).toEqual(expect.any(Number));
    expect(configuracion.limiteJson).toEqual(expect.any(String));
    expect(configuracion.corsOrigenes).toEqual(expect.any(Array));
    expect(configuracion.redisUrl).toBe('');
  });

  it('lee motores, pasadas y prefijo del entorno', async () => {
    process.env.QR_MOTORES = ' ZXING , jsqr,';
    process.env.QR_DECODE_PASADAS_EXTENDIDAS = 'off';
    process.env.RATE_LIMIT_PREFIJO = '  ';
    process.env.RATE_LIMIT_HABILITADO = 'false';

    const { configuracion: recargada } = await import('../src/configuracion');
    expect(recargada.qrMotores).toEqual(['zxing', 'jsqr']);
    expect(recargada.qrDecodePasadasExtendidas).toBe(false);
    expect(recargada.rateLimitPrefijo).toBe('rate_limit');
    expect(recargada.rateLimitHabilitado).toBe(false);
  });

  it('parsearNumeroSeguro acota y usa el default ante basura', () => {
    expect(parsearNumeroSeguro(undefined, 5)).toBe(5);
    expect(parsearNumeroSeguro('', 5)).toBe(5);
    expect(parsearNumeroSeguro('abc', 5)).toBe(5);
    expect(parsearNumeroSeguro('20', 5, { max: 10 })).toBe(10);
    expect(parsearNumeroSeguro(-3, 5, { min: 0 })).toBe(0);
    expect(parsearNumeroSeguro('7', 5, { min: 0, max: 10 })).toBe(7);
  });
});
