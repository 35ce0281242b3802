/**
 * Almacen de contadores sobre Redis.
 *
 * La revision de topes y el incremento de las tres ventanas corren en un solo
 * script Lua (EVAL), que Redis ejecuta de forma atomica: dos solicitudes
 * simultaneas no pueden leer "bajo el tope" antes de que alguna incremente.
 */
import type Redis from 'ioredis';
import { ErrorAlmacenNoDisponible, type AlmacenContadores, type ResultadoConsumo, type VentanaContador } from './almacenContadores';

// KEYS[i]: clave de la ventana i. ARGV[i]: tope de la ventana i.
// ARGV[n + i]: TTL en segundos de la ventana i.
// Respuesta: {1, c1..cn} admitido, {0, i, conteo} bloqueado en la ventana i.
export const SCRIPT_CONSUMIR_VENTANAS = `
local n = #KEYS
local actuales = {}
for i = 1, n do
  local actual = tonumber(redis.call('GET', KEYS[i]) or '0') or 0
  if actual >= tonumber(ARGV[i]) then
    return {0, i, actual}
  end
  actuales[i] = actual
end
local respuesta = {1}
for i = 1, n do
  respuesta[i + 1] = redis.call('INCR', KEYS[i])
  redis.call('EXPIRE', KEYS[i], tonumber(ARGV[n + i]))
end
return respuesta
`;

function escaparPatronGlob(texto: string) {
  return texto.replace(/([*?[\]\\])/g, '\\$1');
}

function aEntero(valor: unknown) {
  const n = typeof valor === 'number' ? valor : Number(valor);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

function describir(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function interpretarRespuestaScript(respuesta: unknown, totalVentanas: number): ResultadoConsumo {
  if (!Array.isArray(respuesta) || respuesta.length === 0) {
    throw new ErrorAlmacenNoDisponible('Respuesta inesperada del script de limites');
  }
  const valores = respuesta.map(aEntero);
  if (valores[0] === 1) {
    return { admitido: true, conteos: valores.slice(1, totalVentanas + 1) };
  }
  // Lua indexa desde 1.
  return { admitido: false, indiceBloqueado: valores[1] - 1, conteo: valores[2] ?? 0 };
}

export class AlmacenContadoresRedis implements AlmacenContadores {
  readonly tipo = 'redis' as const;

  constructor(private readonly redis: Redis) {}

  async consumir(ventanas: VentanaContador[]): Promise<ResultadoConsumo> {
    const claves = ventanas.map((ventana) => ventana.clave);
    const argumentos = [
      ...ventanas.map((ventana) => ventana.limite),
      ...ventanas.map((ventana) => Math.max(1, Math.ceil(ventana.ttlSegundos)))
    ];
    let respuesta: unknown;
    try {
      respuesta = await this.redis.eval(SCRIPT_CONSUMIR_VENTANAS, claves.length, ...claves, ...argumentos);
    } catch (error) {
      throw new ErrorAlmacenNoDisponible(`Fallo consumo de contadores: ${describir(error)}`, { cause: error });
    }
    return interpretarRespuestaScript(respuesta, ventanas.length);
  }

  async leer(claves: string[]): Promise<number[]> {
    if (claves.length === 0) return [];
    try {
      const valores = await this.redis.mget(...claves);
      return valores.map((valor) => (valor === null ? 0 : aEntero(valor)));
    } catch (error) {
      throw new ErrorAlmacenNoDisponible(`Fallo lectura de contadores: ${describir(error)}`, { cause: error });
    }
  }

  async eliminarPorPrefijo(prefijo: string): Promise<number> {
    try {
      const claves = await this.redis.keys(`${escaparPatronGlob(prefijo)}*`);
      if (claves.length === 0) return 0;
      return await this.redis.del(...claves);
    } catch (error) {
      throw new ErrorAlmacenNoDisponible(`Fallo reinicio de contadores: ${describir(error)}`, { cause: error });
    }
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}
