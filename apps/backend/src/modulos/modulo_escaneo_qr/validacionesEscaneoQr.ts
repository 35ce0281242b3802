/**
 * Validaciones de escaneo QR.
 */
import { z } from 'zod';
import { configuracion } from '../../configuracion';
import { MAXIMO_IMAGENES_LOTE } from './servicioEscaneoQr';

const imagenBase64 = z.string().trim().min(1).max(configuracion.qrImagenBase64MaxChars);

export const esquemaDecodificarBase64 = z
  .object({
    imagenBase64,
    incluirRecortes: z.boolean().optional()
  })
  .strict();

export const esquemaDecodificarLote = z
  .object({
    imagenes: z.array(imagenBase64).min(1).max(MAXIMO_IMAGENES_LOTE),
    incluirRecortes: z.boolean().optional()
  })
  .strict();

export const esquemaConsultaDecodificar = z.object({
  recortes: z.enum(['0', '1', 'true', 'false']).optional()
});

export const esquemaInfoDatos = z
  .object({
    datos: z.string()
  })
  .strict();
