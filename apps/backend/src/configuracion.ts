/**
 * Configuracion centralizada del backend.
 */
import dotenv from 'dotenv';
import path from 'node:path';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: path.resolve(__dirname, '..', '..', '..', '.env')
});

const puerto = Number(process.env.PUERTO_API ?? process.env.PORT ?? 4000);
const entorno = process.env.NODE_ENV ?? 'development';
const limiteJson = process.env.LIMITE_JSON ?? '15mb';
const corsOrigenesRaw = String(process.env.CORS_ORIGENES ?? '').trim();
const corsOrigenes = (corsOrigenesRaw || 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

export function parsearNumeroSeguro(valor: unknown, porDefecto: number, { min, max }: { min?: number; max?: number } = {}) {
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (valor === undefined || valor === null || valor === '' || !Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

function parsearBandera(valor: unknown, porDefecto: boolean) {
  const raw = String(valor ?? '').trim().toLowerCase();
  if (!raw) return porDefecto;
  return ['1', 'true', 'yes', 'on'].includes(raw);
}

// Contador compartido de limites: sin REDIS_URL se usa el almacen en memoria
// (solo valido con un unico proceso).
const redisUrl = String(process.env.REDIS_URL ?? '').trim();
if (entorno === 'production' && !redisUrl) {
  throw new Error('REDIS_URL es requerido en producción');
}
if (entorno === 'production' && !corsOrigenesRaw) {
  throw new Error('CORS_ORIGENES es requerido en producción');
}

const rateLimitHabilitado = parsearBandera(process.env.RATE_LIMIT_HABILITADO, true);
const rateLimitPrefijo = String(process.env.RATE_LIMIT_PREFIJO ?? 'rate_limit').trim() || 'rate_limit';

// Imagenes: tope de bytes para subida directa y de caracteres para base64
// (base64 infla ~33%, por eso se controla por longitud de string).
const limiteImagenBytes = parsearNumeroSeguro(process.env.LIMITE_IMAGEN_BYTES, 10 * 1024 * 1024, {
  min: 1024,
  max: 50 * 1024 * 1024
});
const qrImagenBase64MaxChars = parsearNumeroSeguro(process.env.QR_IMAGEN_BASE64_MAX_CHARS, 14_000_000, {
  min: 1_000,
  max: 70_000_000
});
const qrDecodePasadasExtendidas = parsearBandera(process.env.QR_DECODE_PASADAS_EXTENDIDAS, true);
// Motores de lectura habilitados, en orden de prioridad.
const qrMotores = String(process.env.QR_MOTORES ?? 'jsqr,zxing')
  .split(',')
  .map((motor) => motor.trim().toLowerCase())
  .filter(Boolean);

export const configuracion = {
  puerto,
  entorno,
  limiteJson,
  corsOrigenes,
  redisUrl,
  rateLimitHabilitado,
  rateLimitPrefijo,
  limiteImagenBytes,
  qrImagenBase64MaxChars,
  qrDecodePasadasExtendidas,
  qrMotores
};
