/**
 * Validaciones del diseñador de QR.
 *
 * Zod solo revisa forma y tipos. Rangos y enums desconocidos los acota
 * `validarOpcionesDiseno` (con advertencias), no se rechazan aqui.
 */
import { z } from 'zod';
import { configuracion } from '../../configuracion';

const numeroFlexible = z.union([z.number(), z.string().trim().max(32)]).optional();
const textoCorto = z.string().trim().max(64).optional();
const imagenBase64 = z.string().trim().min(1).max(configuracion.qrImagenBase64MaxChars).optional();

export const esquemaEstiloDiseno = z
  .object({
    anchoMarco: numeroFlexible,
    colorMarco: textoCorto,
    sombra: z.boolean().optional(),
    desplazamientoSombra: numeroFlexible,
    colorSombra: textoCorto,
    opacidadSombra: numeroFlexible,
    texto: z.string().max(500).optional(),
    colorTexto: textoCorto,
    tamanoTexto: numeroFlexible,
    posicionTexto: textoCorto
  })
  .strict();

export const esquemaDisenarQr = z
  .object({
    datos: z.string(),
    tamano: numeroFlexible,
    borde: numeroFlexible,
    correccionErrores: textoCorto,
    colorRelleno: textoCorto,
    colorFondo: textoCorto,
    dibujanteModulo: textoCorto,
    mascaraColor: textoCorto,
    radioEsquina: numeroFlexible,
    logoBase64: imagenBase64,
    tamanoLogo: numeroFlexible,
    posicionLogo: textoCorto,
    fondoBase64: imagenBase64,
    estilo: esquemaEstiloDiseno.optional(),
    formato: z.enum(['json', 'png']).optional()
  })
  .strict();

export const esquemaVistaPrevia = esquemaDisenarQr.extend({
  plantilla: z.string().trim().min(1).max(64)
});

export const esquemaConsultaPng = z.object({
  datos: z.string().min(1),
  tamano: z.string().optional(),
  correccionErrores: z.string().optional()
});

export type CuerpoDisenoQr = z.infer<typeof esquemaDisenarQr>;
