/**
 * Entrada de imagenes: bytes/base64 -> `Imagen` RGBA, y recortes de vista previa.
 *
 * Un archivo corrupto o vacio se reporta con `MENSAJE_IMAGEN_ILEGIBLE` antes de
 * invocar cualquier motor.
 */
import sharp from 'sharp';
import { exito, fallo, type Resultado } from '../../compartido/tipos/resultado';
import { expandirCajaRecorte } from './preprocesamiento/preprocesadorImagen';
import { MENSAJE_IMAGEN_ILEGIBLE, type CajaDelimitadora, type Imagen } from './tiposEscaneo';

const PATRON_BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;
export const LADO_MINIMO_RECORTE_PX = 100;

/**
 * Quita el prefijo data-URL (todo hasta la primera coma) y espacios.
 */
export function limpiarBase64(entrada: string) {
  const sinPrefijo = entrada.includes(',') ? entrada.slice(entrada.indexOf(',') + 1) : entrada;
  return sinPrefijo.replace(/\s+/g, '');
}

export function bytesDesdeBase64(entrada: string): Resultado<Buffer> {
  const limpio = limpiarBase64(entrada);
  if (!limpio) return fallo('ENTRADA_INVALIDA', 'La imagen base64 esta vacia');
  if (!PATRON_BASE64.test(limpio) || limpio.length % 4 === 1) {
    return fallo('ENTRADA_INVALIDA', 'La imagen base64 no es valida');
  }
  return exito(Buffer.from(limpio, 'base64'));
}

export async function leerImagen(bytes: Buffer): Promise<Resultado<Imagen>> {
  if (bytes.length === 0) return fallo('ENTRADA_INVALIDA', MENSAJE_IMAGEN_ILEGIBLE);
  try {
    const { data, info } = await sharp(bytes).rotate().ensureAlpha().raw().toBuffer({ resolveWithObject: true });
    return exito({
      datos: new Uint8ClampedArray(data.buffer, data.byteOffset, data.length),
      ancho: info.width,
      alto: info.height,
      canales: 4
    });
  } catch {
    return fallo('ENTRADA_INVALIDA', MENSAJE_IMAGEN_ILEGIBLE);
  }
}

/**
 * PNG (base64) de la region del simbolo, ampliada a un lado minimo de 100 px.
 */
export async function recortarSimbolo(bytes: Buffer, caja: CajaDelimitadora, ancho: number, alto: number) {
  const region = expandirCajaRecorte(caja, ancho, alto, LADO_MINIMO_RECORTE_PX);
  const png = await sharp(bytes)
    .rotate()
    .extract({ left: region.x, top: region.y, width: region.ancho, height: region.alto })
    .png()
    .toBuffer();
  return png.toString('base64');
}
