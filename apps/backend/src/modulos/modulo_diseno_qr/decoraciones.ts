/**
 * Composicion con sharp: logo, fondo, marco, sombra y texto.
 *
 * Cada paso recibe y devuelve PNG. Las imagenes del usuario (logo, fondo) que
 * sharp no puede leer producen `ENTRADA_INVALIDA`.
 */
import sharp from 'sharp';
import { exito, fallo, type Resultado } from '../../compartido/tipos/resultado';
import { hexARgb } from './pintorModulos';
import type { DecoracionesRender, PosicionLogo } from './tiposDiseno';

const BLANCO_OPACO = { r: 255, g: 255, b: 255, alpha: 1 };
const TRANSPARENTE = { r: 0, g: 0, b: 0, alpha: 0 };
const MARGEN_TEXTO_PX = 10;

export type Dimensiones = { ancho: number; alto: number };

/**
 * Esquina superior izquierda del logo (division entera, como anclas fijas del lienzo).
 */
export function posicionLogo(posicion: PosicionLogo, ancho: number, alto: number, lado: number) {
  switch (posicion) {
    case 'top-left':
      return { x: Math.floor(ancho / 4), y: Math.floor(alto / 4) };
    case 'top-right':
      return { x: Math.floor((ancho * 3) / 4) - lado, y: Math.floor(alto / 4) };
    case 'bottom-left':
      return { x: Math.floor(ancho / 4), y: Math.floor((alto * 3) / 4) - lado };
    case 'bottom-right':
      return { x: Math.floor((ancho * 3) / 4) - lado, y: Math.floor((alto * 3) / 4) - lado };
    case 'center':
      return { x: Math.floor((ancho - lado) / 2), y: Math.floor((alto - lado) / 2) };
  }
}

/**
 * Ajusta el logo dentro de un cuadro de `lado` px (sin ampliarlo) y lo centra
 * sobre un cuadro blanco opaco del mismo lado.
 */
export async function prepararLogo(logo: Buffer, lado: number): Promise<Resultado<Buffer>> {
  let ajustado: { data: Buffer; info: sharp.OutputInfo };
  try {
    ajustado = await sharp(logo)
      .ensureAlpha()
      .resize(lado, lado, { fit: 'inside', withoutEnlargement: true, kernel: 'lanczos3' })
      .png()
      .toBuffer({ resolveWithObject: true });
  } catch {
    return fallo('ENTRADA_INVALIDA', 'El logo no es una imagen valida');
  }

  const cuadro = await sharp({ create: { width: lado, height: lado, channels: 4, background: BLANCO_OPACO } })
    .composite([
      {
        input: ajustado.data,
        left: Math.floor((lado - ajustado.info.width) / 2),
        top: Math.floor((lado - ajustado.info.height) / 2)
      }
    ])
    .png()
    .toBuffer();
  return exito(cuadro);
}

export async function pegarLogo(
  png: Buffer,
  dimensiones: Dimensiones,
  logo: Buffer,
  lado: number,
  posicion: PosicionLogo
): Promise<Resultado<Buffer>> {
  // El cuadro nunca puede exceder el lienzo ni salir de el.
  const ladoEfectivo = Math.max(1, Math.min(lado, dimensiones.ancho, dimensiones.alto));
  const cuadro = await prepararLogo(logo, ladoEfectivo);
  if (!cuadro.ok) return cuadro;
  const { x, y } = posicionLogo(posicion, dimensiones.ancho, dimensiones.alto, ladoEfectivo);
  const left = Math.min(Math.max(0, x), dimensiones.ancho - ladoEfectivo);
  const top = Math.min(Math.max(0, y), dimensiones.alto - ladoEfectivo);
  const resultado = await sharp(png).composite([{ input: cuadro.valor, left, top }]).png().toBuffer();
  return exito(resultado);
}

/**
 * Escala el fondo al lienzo y compone el QR encima.
 */
export async function aplicarFondo(png: Buffer, dimensiones: Dimensiones, fondo: Buffer): Promise<Resultado<Buffer>> {
  let base: Buffer;
  try {
    base = await sharp(fondo)
      .ensureAlpha()
      .resize(dimensiones.ancho, dimensiones.alto, { fit: 'fill', kernel: 'lanczos3' })
      .png()
      .toBuffer();
  } catch {
    return fallo('ENTRADA_INVALIDA', 'La imagen de fondo no es valida');
  }
  const resultado = await sharp(base).composite([{ input: png }]).png().toBuffer();
  return exito(resultado);
}

function escaparXml(texto: string) {
  return texto
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Linea base del texto para que su caja quede a 10 px del borde (arriba/abajo)
 * o centrada. Aproxima ascendente 0.8 y descendente 0.2 del tamano.
 */
export function lineaBaseTexto(posicion: 'top' | 'center' | 'bottom', alto: number, tamano: number) {
  if (posicion === 'top') return MARGEN_TEXTO_PX + Math.round(tamano * 0.8);
  if (posicion === 'bottom') return alto - MARGEN_TEXTO_PX - Math.round(tamano * 0.2);
  return Math.round(alto / 2 + tamano * 0.3);
}

export function svgTexto(
  texto: NonNullable<DecoracionesRender['texto']>,
  dimensiones: Dimensiones
) {
  const y = lineaBaseTexto(texto.posicion, dimensiones.alto, texto.tamano);
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${dimensiones.ancho}" height="${dimensiones.alto}">` +
    `<text x="${Math.floor(dimensiones.ancho / 2)}" y="${y}" text-anchor="middle" ` +
    `font-family="Arial, Helvetica, sans-serif" font-size="${texto.tamano}" fill="${texto.color}">` +
    `${escaparXml(texto.contenido)}</text></svg>`
  );
}

/**
 * Marco, sombra y texto, en ese orden. Cada paso puede cambiar el tamano del lienzo.
 */
export async function aplicarDecoraciones(png: Buffer, decoraciones: DecoracionesRender): Promise<Buffer> {
  let actual = png;

  if (decoraciones.marco) {
    const { ancho, color } = decoraciones.marco;
    actual = await sharp(actual)
      .extend({ top: ancho, bottom: ancho, left: ancho, right: ancho, background: { ...hexARgb(color), alpha: 1 } })
      .png()
      .toBuffer();
  }

  if (decoraciones.sombra) {
    const { desplazamiento, color, opacidad } = decoraciones.sombra;
    const meta = await sharp(actual).metadata();
    const ancho = meta.width ?? 0;
    const alto = meta.height ?? 0;
    const sombra = await sharp({
      create: { width: ancho, height: alto, channels: 4, background: { ...hexARgb(color), alpha: opacidad } }
    })
      .png()
      .toBuffer();
    actual = await sharp({
      create: { width: ancho + desplazamiento, height: alto + desplazamiento, channels: 4, background: TRANSPARENTE }
    })
      .composite([
        { input: sombra, left: desplazamiento, top: desplazamiento },
        { input: actual, left: 0, top: 0 }
      ])
      .png()
      .toBuffer();
  }

  if (decoraciones.texto) {
    const meta = await sharp(actual).metadata();
    const svg = svgTexto(decoraciones.texto, { ancho: meta.width ?? 0, alto: meta.height ?? 0 });
    actual = await sharp(actual)
      .composite([{ input: Buffer.from(svg), left: 0, top: 0 }])
      .png()
      .toBuffer();
  }

  return actual;
}
