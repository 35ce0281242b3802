/**
 * Logger estructurado del backend.
 *
 * Contrato:
 * - `log(nivel, mensaje, meta)` para eventos operativos.
 * - `logError(mensaje, error, meta)` serializa el error (nombre, mensaje, stack).
 * - El nivel `ok` se emite como `info` con `ok: true` para marcar hitos de arranque.
 */
import pino from 'pino';

export type NivelLog = 'debug' | 'info' | 'ok' | 'warn' | 'error';

const esTest = String(process.env.NODE_ENV ?? '').trim().toLowerCase() === 'test';
const nivelesValidos = ['debug', 'info', 'warn', 'error'];
const nivelEntorno = String(process.env.LOG_NIVEL ?? 'info').trim().toLowerCase();

const logger = pino({
  name: 'api-qr',
  level: esTest ? 'silent' : nivelesValidos.includes(nivelEntorno) ? nivelEntorno : 'info',
  formatters: {
    level: (etiqueta: string) => ({ nivel: etiqueta })
  },
  serializers: {
    err: pino.stdSerializers.err
  }
});

export function log(nivel: NivelLog, mensaje: string, meta: Record<string, unknown> = {}) {
  switch (nivel) {
    case 'debug':
      logger.debug(meta, mensaje);
      return;
    case 'ok':
      logger.info({ ...meta, ok: true }, mensaje);
      return;
    case 'warn':
      logger.warn(meta, mensaje);
      return;
    case 'error':
      logger.error(meta, mensaje);
      return;
    default:
      logger.info(meta, mensaje);
  }
}

export function logError(mensaje: string, error?: unknown, meta: Record<string, unknown> = {}) {
  if (error instanceof Error) {
    logger.error({ ...meta, err: error }, mensaje);
    return;
  }
  logger.error(error === undefined ? meta : { ...meta, detalle: String(error) }, mensaje);
}
