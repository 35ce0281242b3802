/**
 * Cliente Redis para los contadores de limites.
 *
 * Decisiones:
 * - Sin `REDIS_URL` no se crea cliente; el limitador usa el almacen en memoria.
 * - `enableOfflineQueue: false` y un solo reintento por comando: con Redis caido
 *   cada consulta falla rapido y el limitador aplica fail-open.
 */
import Redis from 'ioredis';
import { configuracion } from '../../configuracion';
import { log, logError } from '../logging/logger';
import type { AlmacenContadores } from '../../modulos/modulo_limite_tasa/almacenContadores';
import { AlmacenContadoresMemoria } from '../../modulos/modulo_limite_tasa/almacenContadoresMemoria';
import { AlmacenContadoresRedis } from '../../modulos/modulo_limite_tasa/almacenContadoresRedis';

export function crearClienteRedis(url: string): Redis {
  const cliente = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false
  });
  cliente.on('error', (error: unknown) => {
    logError('Error en la conexion a Redis', error);
  });
  cliente.on('ready', () => {
    log('ok', 'Conexion a Redis lista');
  });
  return cliente;
}

export async function crearAlmacenContadores(): Promise<AlmacenContadores> {
  if (!configuracion.redisUrl) {
    log('warn', 'REDIS_URL no esta definido; se usan contadores en memoria');
    return new AlmacenContadoresMemoria();
  }

  const cliente = crearClienteRedis(configuracion.redisUrl);
  try {
    await cliente.connect();
  } catch (error) {
    // El limitador sigue operando en fail-open hasta que Redis responda.
    logError('No se pudo conectar a Redis al iniciar', error);
  }
  return new AlmacenContadoresRedis(cliente);
}
