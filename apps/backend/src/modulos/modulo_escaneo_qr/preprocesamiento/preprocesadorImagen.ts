/**
 * Transformaciones puras de imagen usadas por la cascada de decodificacion.
 *
 * Todas reciben un `Imagen` y devuelven uno nuevo; ninguna modifica su entrada.
 * Las operaciones de umbral y morfologia trabajan sobre un canal: si la entrada
 * trae color se convierte a grises primero.
 */
import type { CajaDelimitadora, Imagen } from '../tiposEscaneo';

export type TipoUmbral = 'binario' | 'binario_inv' | 'truncado' | 'a_cero' | 'a_cero_inv';

export const TIPOS_UMBRAL: readonly TipoUmbral[] = ['binario', 'binario_inv', 'truncado', 'a_cero', 'a_cero_inv'];

const VALOR_MAXIMO = 255;

export function aEscalaGrises(imagen: Imagen): Imagen {
  const { ancho, alto, canales, datos } = imagen;
  if (canales === 1) return { ancho, alto, canales, datos: new Uint8ClampedArray(datos) };
  const total = ancho * alto;
  const out = new Uint8ClampedArray(total);
  for (let i = 0, p = 0; i < total; i += 1, p += canales) {
    out[i] = Math.round(0.299 * datos[p] + 0.587 * datos[p + 1] + 0.114 * datos[p + 2]);
  }
  return { ancho, alto, canales: 1, datos: out };
}

function exigirGris(imagen: Imagen) {
  return imagen.canales === 1 ? imagen : aEscalaGrises(imagen);
}

/**
 * Expande a RGBA (formato que esperan los lectores basados en canvas).
 */
export function aRgba(imagen: Imagen): Imagen {
  const { ancho, alto, canales, datos } = imagen;
  if (canales === 4) return imagen;
  const total = ancho * alto;
  const out = new Uint8ClampedArray(total * 4);
  for (let i = 0, p = 0, q = 0; i < total; i += 1, p += canales, q += 4) {
    if (canales === 1) {
      const v = datos[p];
      out[q] = v;
      out[q + 1] = v;
      out[q + 2] = v;
    } else {
      out[q] = datos[p];
      out[q + 1] = datos[p + 1];
      out[q + 2] = datos[p + 2];
    }
    out[q + 3] = VALOR_MAXIMO;
  }
  return { ancho, alto, canales: 4, datos: out };
}

function pesoCubico(t: number) {
  const a = -0.75;
  const x = Math.abs(t);
  if (x <= 1) return (a + 2) * x * x * x - (a + 3) * x * x + 1;
  if (x < 2) return a * x * x * x - 5 * a * x * x + 8 * a * x - 4 * a;
  return 0;
}

type Muestreo = { indices: Int32Array; pesos: Float64Array };

// Centros de pixel alineados: origen = (destino + 0.5) * escala - 0.5.
function prepararMuestreo(tamanoOrigen: number, tamanoDestino: number): Muestreo {
  const escala = tamanoOrigen / tamanoDestino;
  const indices = new Int32Array(tamanoDestino * 4);
  const pesos = new Float64Array(tamanoDestino * 4);
  for (let d = 0; d < tamanoDestino; d += 1) {
    const origen = (d + 0.5) * escala - 0.5;
    const base = Math.floor(origen);
    const fraccion = origen - base;
    for (let k = 0; k < 4; k += 1) {
      const idx = Math.min(tamanoOrigen - 1, Math.max(0, base - 1 + k));
      indices[d * 4 + k] = idx;
      pesos[d * 4 + k] = pesoCubico(fraccion - (k - 1));
    }
  }
  return { indices, pesos };
}

/**
 * Redimension bicubica (bordes replicados).
 */
export function redimensionarBicubico(imagen: Imagen, ancho: number, alto: number): Imagen {
  const destinoAncho = Math.max(1, Math.floor(ancho));
  const destinoAlto = Math.max(1, Math.floor(alto));
  const { canales, datos } = imagen;
  const mx = prepararMuestreo(imagen.ancho, destinoAncho);
  const my = prepararMuestreo(imagen.alto, destinoAlto);
  const out = new Uint8ClampedArray(destinoAncho * destinoAlto * canales);

  for (let y = 0; y < destinoAlto; y += 1) {
    for (let x = 0; x < destinoAncho; x += 1) {
      for (let c = 0; c < canales; c += 1) {
        let suma = 0;
        for (let j = 0; j < 4; j += 1) {
          const fila = my.indices[y * 4 + j] * imagen.ancho;
          const pesoY = my.pesos[y * 4 + j];
          for (let i = 0; i < 4; i += 1) {
            const col = mx.indices[x * 4 + i];
            suma += datos[(fila + col) * canales + c] * pesoY * mx.pesos[x * 4 + i];
          }
        }
        out[(y * destinoAncho + x) * canales + c] = Math.round(suma);
      }
    }
  }
  return { ancho: destinoAncho, alto: destinoAlto, canales, datos: out };
}

/**
 * Si algun lado es menor a `minimo`, escala proporcionalmente hasta que ambos
 * lleguen al minimo. En otro caso regresa la misma imagen.
 */
export function redimensionarSiPequena(imagen: Imagen, minimo: number): Imagen {
  if (imagen.ancho >= minimo && imagen.alto >= minimo) return imagen;
  const escala = Math.max(minimo / imagen.alto, minimo / imagen.ancho);
  return redimensionarBicubico(imagen, Math.floor(imagen.ancho * escala), Math.floor(imagen.alto * escala));
}

export function umbralFijo(imagen: Imagen, umbral: number, tipo: TipoUmbral): Imagen {
  const gris = exigirGris(imagen);
  const out = new Uint8ClampedArray(gris.datos.length);
  for (let i = 0; i < gris.datos.length; i += 1) {
    const v = gris.datos[i];
    const supera = v > umbral;
    switch (tipo) {
      case 'binario':
        out[i] = supera ? VALOR_MAXIMO : 0;
        break;
      case 'binario_inv':
        out[i] = supera ? 0 : VALOR_MAXIMO;
        break;
      case 'truncado':
        out[i] = supera ? umbral : v;
        break;
      case 'a_cero':
        out[i] = supera ? v : 0;
        break;
      case 'a_cero_inv':
        out[i] = supera ? 0 : v;
        break;
    }
  }
  return { ancho: gris.ancho, alto: gris.alto, canales: 1, datos: out };
}

/**
 * Umbral que maximiza la varianza entre clases del histograma.
 */
export function calcularUmbralOtsu(imagen: Imagen): number {
  const gris = exigirGris(imagen);
  const histograma = new Float64Array(256);
  for (let i = 0; i < gris.datos.length; i += 1) histograma[gris.datos[i]] += 1;
  const total = gris.datos.length;

  let sumaTotal = 0;
  for (let t = 0; t < 256; t += 1) sumaTotal += t * histograma[t];

  let pesoFondo = 0;
  let sumaFondo = 0;
  let mejorVarianza = -1;
  let mejorUmbral = 0;
  for (let t = 0; t < 256; t += 1) {
    pesoFondo += histograma[t];
    if (pesoFondo === 0) continue;
    const pesoFrente = total - pesoFondo;
    if (pesoFrente === 0) break;
    sumaFondo += t * histograma[t];
    const mediaFondo = sumaFondo / pesoFondo;
    const mediaFrente = (sumaTotal - sumaFondo) / pesoFrente;
    const varianza = pesoFondo * pesoFrente * (mediaFondo - mediaFrente) ** 2;
    if (varianza > mejorVarianza) {
      mejorVarianza = varianza;
      mejorUmbral = t;
    }
  }
  return mejorUmbral;
}

export function umbralOtsu(imagen: Imagen): { imagen: Imagen; umbral: number } {
  const umbral = calcularUmbralOtsu(imagen);
  return { imagen: umbralFijo(imagen, umbral, 'binario'), umbral };
}

function nucleoGaussiano(tamano: number) {
  const sigma = 0.3 * ((tamano - 1) * 0.5 - 1) + 0.8;
  const centro = (tamano - 1) / 2;
  const nucleo = new Float64Array(tamano);
  let suma = 0;
  for (let i = 0; i < tamano; i += 1) {
    const d = i - centro;
    nucleo[i] = Math.exp(-(d * d) / (2 * sigma * sigma));
    suma += nucleo[i];
  }
  for (let i = 0; i < tamano; i += 1) nucleo[i] /= suma;
  return nucleo;
}

function desenfoqueGaussiano(gris: Imagen, tamano: number) {
  const { ancho, alto, datos } = gris;
  const nucleo = nucleoGaussiano(tamano);
  const radio = (tamano - 1) / 2;
  const horizontal = new Float64Array(ancho * alto);
  for (let y = 0; y < alto; y += 1) {
    for (let x = 0; x < ancho; x += 1) {
      let suma = 0;
      for (let k = -radio; k <= radio; k += 1) {
        const xx = Math.min(ancho - 1, Math.max(0, x + k));
        suma += datos[y * ancho + xx] * nucleo[k + radio];
      }
      horizontal[y * ancho + x] = suma;
    }
  }
  const out = new Float64Array(ancho * alto);
  for (let y = 0; y < alto; y += 1) {
    for (let x = 0; x < ancho; x += 1) {
      let suma = 0;
      for (let k = -radio; k <= radio; k += 1) {
        const yy = Math.min(alto - 1, Math.max(0, y + k));
        suma += horizontal[yy * ancho + x] * nucleo[k + radio];
      }
      out[y * ancho + x] = suma;
    }
  }
  return out;
}

/**
 * Umbral adaptativo: un pixel es blanco si supera la media gaussiana de su
 * vecindario (`bloque` impar) menos `c`.
 */
export function umbralAdaptativoGaussiano(imagen: Imagen, bloque: number, c: number): Imagen {
  if (bloque < 3 || bloque % 2 === 0) {
    throw new Error(`El bloque del umbral adaptativo debe ser impar y >= 3 (recibido ${bloque})`);
  }
  const gris = exigirGris(imagen);
  const medias = desenfoqueGaussiano(gris, bloque);
  const out = new Uint8ClampedArray(gris.datos.length);
  for (let i = 0; i < gris.datos.length; i += 1) {
    out[i] = gris.datos[i] > Math.round(medias[i]) - c ? VALOR_MAXIMO : 0;
  }
  return { ancho: gris.ancho, alto: gris.alto, canales: 1, datos: out };
}

function filtroExtremo(gris: Imagen, radio: number, modo: 'max' | 'min'): Imagen {
  const { ancho, alto, datos } = gris;
  const elegir = modo === 'max' ? Math.max : Math.min;
  const horizontal = new Uint8ClampedArray(datos.length);
  for (let y = 0; y < alto; y += 1) {
    for (let x = 0; x < ancho; x += 1) {
      let valor = datos[y * ancho + x];
      for (let k = -radio; k <= radio; k += 1) {
        const xx = Math.min(ancho - 1, Math.max(0, x + k));
        valor = elegir(valor, datos[y * ancho + xx]);
      }
      horizontal[y * ancho + x] = valor;
    }
  }
  const out = new Uint8ClampedArray(datos.length);
  for (let y = 0; y < alto; y += 1) {
    for (let x = 0; x < ancho; x += 1) {
      let valor = horizontal[y * ancho + x];
      for (let k = -radio; k <= radio; k += 1) {
        const yy = Math.min(alto - 1, Math.max(0, y + k));
        valor = elegir(valor, horizontal[yy * ancho + x]);
      }
      out[y * ancho + x] = valor;
    }
  }
  return { ancho, alto, canales: 1, datos: out };
}

/**
 * Cierre morfologico con elemento rectangular `tamano`x`tamano`:
 * dilatacion (maximo) seguida de erosion (minimo). Rellena huecos oscuros
 * menores al elemento.
 */
export function cierreMorfologico(imagen: Imagen, tamano = 3): Imagen {
  const radio = Math.floor(tamano / 2);
  return filtroExtremo(filtroExtremo(exigirGris(imagen), radio, 'max'), radio, 'min');
}

/**
 * Para QR con logo al centro: lleva la imagen a grises, la escala hasta que
 * ambos lados midan al menos `minimo` y pinta de blanco un circulo central de
 * radio `min(ancho, alto) / 6`.
 */
export function enmascararLogoCentral(imagen: Imagen, minimo = 500): Imagen {
  const base = redimensionarSiPequena(exigirGris(imagen), minimo);
  const datos = new Uint8ClampedArray(base.datos);
  const cx = Math.floor(base.ancho / 2);
  const cy = Math.floor(base.alto / 2);
  const radio = Math.floor(Math.min(base.ancho, base.alto) / 6);
  for (let y = Math.max(0, cy - radio); y <= Math.min(base.alto - 1, cy + radio); y += 1) {
    for (let x = Math.max(0, cx - radio); x <= Math.min(base.ancho - 1, cx + radio); x += 1) {
      const dx = x - cx;
      const dy = y - cy;
      if (dx * dx + dy * dy <= radio * radio) datos[y * base.ancho + x] = VALOR_MAXIMO;
    }
  }
  return { ancho: base.ancho, alto: base.alto, canales: 1, datos };
}

/**
 * Caja de recorte para vista previa: crece alrededor de su centro hasta que su
 * lado menor mida `minimo` (escala proporcional) y se recorta a los limites de
 * la imagen. Coordenadas enteras.
 */
export function expandirCajaRecorte(
  caja: CajaDelimitadora,
  anchoImagen: number,
  altoImagen: number,
  minimo = 100
): CajaDelimitadora {
  const ladoMenor = Math.max(1, Math.min(caja.ancho, caja.alto));
  const escala = ladoMenor < minimo ? minimo / ladoMenor : 1;
  const ancho = caja.ancho * escala;
  const alto = caja.alto * escala;
  const cx = caja.x + caja.ancho / 2;
  const cy = caja.y + caja.alto / 2;

  const x0 = Math.max(0, Math.floor(cx - ancho / 2));
  const y0 = Math.max(0, Math.floor(cy - alto / 2));
  const x1 = Math.min(anchoImagen, Math.ceil(cx + ancho / 2));
  const y1 = Math.min(altoImagen, Math.ceil(cy + alto / 2));
  return { x: x0, y: y0, ancho: Math.max(1, x1 - x0), alto: Math.max(1, y1 - y0) };
}
