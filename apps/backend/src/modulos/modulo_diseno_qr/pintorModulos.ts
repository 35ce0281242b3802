/**
 * Pintado de la matriz a un raster RGBA a 10 px por modulo.
 *
 * - Dibujante: forma de cada modulo oscuro dentro de su celda.
 * - Mascara: color de cada pixel oscuro segun su posicion en el lienzo
 *   completo (incluida la zona de silencio).
 */
import type { MatrizQr } from './matrizQr';
import type { ColorHex, DibujanteModulo, MascaraColor, Rgb } from './tiposDiseno';

export const PIXELES_POR_MODULO = 10;
export const FACTOR_OSCURECER_GRADIENTE = 0.3;

// Proporcion del lado que ocupa el cuadro en `gapped_square`.
const PROPORCION_CUADRO_SEPARADO = 0.8;

export type OpcionesPintado = {
  borde: number;
  dibujanteModulo: DibujanteModulo;
  mascaraColor: MascaraColor;
  radioEsquina: number;
  colorRelleno: ColorHex;
  colorFondo: ColorHex;
};

export type RasterRgba = { datos: Uint8ClampedArray; lado: number };

export function hexARgb(color: ColorHex): Rgb {
  const limpio = color.replace(/^#/, '');
  return {
    r: Number.parseInt(limpio.slice(0, 2), 16),
    g: Number.parseInt(limpio.slice(2, 4), 16),
    b: Number.parseInt(limpio.slice(4, 6), 16)
  };
}

export function oscurecer(color: Rgb, factor: number): Rgb {
  return {
    r: Math.max(0, Math.trunc(color.r * (1 - factor))),
    g: Math.max(0, Math.trunc(color.g * (1 - factor))),
    b: Math.max(0, Math.trunc(color.b * (1 - factor)))
  };
}

function interpolar(desde: Rgb, hasta: Rgb, t: number): Rgb {
  const u = Math.min(1, Math.max(0, t));
  return {
    r: Math.trunc(hasta.r * u + desde.r * (1 - u)),
    g: Math.trunc(hasta.g * u + desde.g * (1 - u)),
    b: Math.trunc(hasta.b * u + desde.b * (1 - u))
  };
}

/**
 * Color del pixel (x, y) de un modulo oscuro en un lienzo de `lado` px.
 */
export function colorMascara(mascara: MascaraColor, relleno: Rgb, x: number, y: number, lado: number): Rgb {
  if (mascara === 'solid') return relleno;
  const borde = oscurecer(relleno, FACTOR_OSCURECER_GRADIENTE);
  const mitad = lado / 2;
  switch (mascara) {
    case 'radial_gradient':
      return interpolar(relleno, borde, Math.hypot(x - mitad, y - mitad) / (Math.SQRT2 * mitad));
    case 'square_gradient':
      return interpolar(relleno, borde, Math.max(Math.abs(x - mitad), Math.abs(y - mitad)) / mitad);
    case 'horizontal_gradient':
      return interpolar(relleno, borde, x / lado);
    case 'vertical_gradient':
      return interpolar(relleno, borde, y / lado);
  }
}

type Vecinos = { arriba: boolean; abajo: boolean; izquierda: boolean; derecha: boolean };

/**
 * `true` si el pixel con centro (px, py), relativo a la celda, pertenece al modulo.
 */
export function cubrePixel(
  dibujante: DibujanteModulo,
  px: number,
  py: number,
  vecinos: Vecinos,
  radioEsquina: number
): boolean {
  const celda = PIXELES_POR_MODULO;
  const mitad = celda / 2;
  switch (dibujante) {
    case 'square':
      return true;
    case 'gapped_square': {
      const margen = ((1 - PROPORCION_CUADRO_SEPARADO) * celda) / 2;
      return px >= margen && px <= celda - margen && py >= margen && py <= celda - margen;
    }
    case 'circle':
      return (px - mitad) ** 2 + (py - mitad) ** 2 <= mitad * mitad;
    case 'rounded': {
      // Cada esquina se redondea solo si sus dos vecinos adyacentes estan vacios.
      const radio = (radioEsquina / 10) * mitad;
      if (radio <= 0) return true;
      const enIzquierda = px < mitad;
      const enArriba = py < mitad;
      const vecinoHorizontal = enIzquierda ? vecinos.izquierda : vecinos.derecha;
      const vecinoVertical = enArriba ? vecinos.arriba : vecinos.abajo;
      if (vecinoHorizontal || vecinoVertical) return true;
      const lx = enIzquierda ? px : celda - px;
      const ly = enArriba ? py : celda - py;
      if (lx >= radio || ly >= radio) return true;
      return (lx - radio) ** 2 + (ly - radio) ** 2 <= radio * radio;
    }
  }
}

export function pintarMatriz(matriz: MatrizQr, opciones: OpcionesPintado): RasterRgba {
  const celda = PIXELES_POR_MODULO;
  const lado = (matriz.tamano + 2 * opciones.borde) * celda;
  const datos = new Uint8ClampedArray(lado * lado * 4);
  const fondo = hexARgb(opciones.colorFondo);
  const relleno = hexARgb(opciones.colorRelleno);

  for (let i = 0; i < datos.length; i += 4) {
    datos[i] = fondo.r;
    datos[i + 1] = fondo.g;
    datos[i + 2] = fondo.b;
    datos[i + 3] = 255;
  }

  for (let fila = 0; fila < matriz.tamano; fila += 1) {
    for (let columna = 0; columna < matriz.tamano; columna += 1) {
      if (!matriz.esOscuro(fila, columna)) continue;
      const vecinos = {
        arriba: matriz.esOscuro(fila - 1, columna),
        abajo: matriz.esOscuro(fila + 1, columna),
        izquierda: matriz.esOscuro(fila, columna - 1),
        derecha: matriz.esOscuro(fila, columna + 1)
      };
      const x0 = (columna + opciones.borde) * celda;
      const y0 = (fila + opciones.borde) * celda;
      for (let dy = 0; dy < celda; dy += 1) {
        for (let dx = 0; dx < celda; dx += 1) {
          if (!cubrePixel(opciones.dibujanteModulo, dx + 0.5, dy + 0.5, vecinos, opciones.radioEsquina)) continue;
          const x = x0 + dx;
          const y = y0 + dy;
          const color = colorMascara(opciones.mascaraColor, relleno, x, y, lado);
          const p = (y * lado + x) * 4;
          datos[p] = color.r;
          datos[p + 1] = color.g;
          datos[p + 2] = color.b;
        }
      }
    }
  }

  return { datos, lado };
}
