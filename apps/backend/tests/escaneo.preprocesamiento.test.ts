/**
 * escaneo.preprocesamiento.test
 *
 * Responsabilidad: Transformaciones de imagen de la cascada (umbral, Otsu,
 * morfologia, mascara de logo, recorte).
 */
import { describe, expect, it } from 'vitest';
import {
  aEscalaGrises,
  aRgba,
  calcularUmbralOtsu,
  cierreMorfologico,
  enmascararLogoCentral,
  expandirCajaRecorte,
  redimensionarSiPequena,
  umbralAdaptativoGaussiano,
  umbralFijo,
  umbralOtsu
} from '../src/modulos/modulo_escaneo_qr/preprocesamiento/preprocesadorImagen';
import type { Imagen } from '../src/modulos/modulo_escaneo_qr/tiposEscaneo';

function gris(ancho: number, alto: number, valores: number[] | number): Imagen {
  const datos = new Uint8ClampedArray(ancho * alto);
  if (typeof valores === 'number') datos.fill(valores);
  else datos.set(valores);
  return { ancho, alto, canales: 1, datos };
}

describe('aEscalaGrises', () => {
  it('pondera RGB con luminancia BT.601', () => {
    const rgba: Imagen = {
      ancho: 3,
      alto: 1,
      canales: 4,
      datos: new Uint8ClampedArray([255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255])
    };
    expect(Array.from(aEscalaGrises(rgba).datos)).toEqual([76, 150, 29]);
  });

  it('aRgba replica el canal gris y deja alfa opaco', () => {
    const rgba = aRgba(gris(2, 1, [10, 200]));
    expect(rgba.canales).toBe(4);
    expect(Array.from(rgba.datos)).toEqual([10, 10, 10, 255, 200, 200, 200, 255]);
  });
});

describe('umbralFijo', () => {
  const entrada = gris(4, 1, [100, 127, 128, 200]);

  it.each([
    ['binario', [0, 0, 255, 255]],
    ['binario_inv', [255, 255, 0, 0]],
    ['truncado', [100, 127, 127, 127]],
    ['a_cero', [0, 0, 128, 200]],
    ['a_cero_inv', [100, 127, 0, 0]]
  ] as const)('aplica %s con comparacion estricta contra 127', (tipo, esperado) => {
    expect(Array.from(umbralFijo(entrada, 127, tipo).datos)).toEqual(esperado);
  });

  it('no modifica la imagen de entrada', () => {
    umbralFijo(entrada, 127, 'binario');
    expect(Array.from(entrada.datos)).toEqual([100, 127, 128, 200]);
  });
});

describe('Otsu', () => {
  it('separa un histograma bimodal en el primer nivel de maxima varianza', () => {
    const imagen = gris(4, 1, [10, 10, 200, 200]);
    expect(calcularUmbralOtsu(imagen)).toBe(10);
    const { imagen: binaria, umbral } = umbralOtsu(imagen);
    expect(umbral).toBe(10);
    expect(Array.from(binaria.datos)).toEqual([0, 0, 255, 255]);
  });
});

describe('redimensionarSiPequena', () => {
  it('escala proporcionalmente hasta que ambos lados alcanzan el minimo', () => {
    const salida = redimensionarSiPequena(gris(100, 50, 80), 200);
    expect(salida.ancho).toBe(400);
    expect(salida.alto).toBe(200);
    expect(salida.datos.every((v) => v === 80)).toBe(true);
  });

  it('regresa la misma imagen si ya cumple el minimo', () => {
    const imagen = gris(200, 300, 0);
    expect(redimensionarSiPequena(imagen, 200)).toBe(imagen);
  });
});

describe('umbralAdaptativoGaussiano', () => {
  it('una imagen uniforme queda blanca (supera media - C)', () => {
    const salida = umbralAdaptativoGaussiano(gris(20, 20, 100), 11, 2);
    expect(salida.datos.every((v) => v === 255)).toBe(true);
  });

  it('rechaza bloques pares o menores a 3', () => {
    expect(() => umbralAdaptativoGaussiano(gris(5, 5, 0), 10, 2)).toThrow(/impar/);
    expect(() => umbralAdaptativoGaussiano(gris(5, 5, 0), 1, 2)).toThrow(/impar/);
  });
});

describe('cierreMorfologico', () => {
  it('rellena un hueco oscuro de un pixel', () => {
    const valores = new Array<number>(25).fill(255);
    valores[12] = 0;
    const salida = cierreMorfologico(gris(5, 5, valores), 3);
    expect(salida.datos.every((v) => v === 255)).toBe(true);
  });

  it('conserva un pixel blanco aislado sobre fondo negro', () => {
    const valores = new Array<number>(25).fill(0);
    valores[12] = 255;
    const salida = cierreMorfologico(gris(5, 5, valores), 3);
    expect(Array.from(salida.datos)).toEqual(valores);
  });
});

describe('enmascararLogoCentral', () => {
  it('pinta de blanco un circulo de radio min/6 en el centro', () => {
    const salida = enmascararLogoCentral(gris(600, 600, 0));
    expect(salida.ancho).toBe(600);
    const en = (x: number, y: number) => salida.datos[y * salida.ancho + x];
    expect(en(300, 300)).toBe(255);
    expect(en(300, 200)).toBe(255);
    expect(en(300, 199)).toBe(0);
    expect(en(0, 0)).toBe(0);
  });

  it('escala imagenes pequenas hasta 500 px antes de enmascarar', () => {
    const salida = enmascararLogoCentral(gris(100, 50, 0));
    expect(salida.ancho).toBe(1000);
    expect(salida.alto).toBe(500);
  });
});

describe('expandirCajaRecorte', () => {
  it('amplia alrededor del centro hasta 100 px de lado menor', () => {
    expect(expandirCajaRecorte({ x: 40, y: 40, ancho: 20, alto: 20 }, 200, 200)).toEqual({
      x: 0,
      y: 0,
      ancho: 100,
      alto: 100
    });
  });

  it('recorta contra los bordes de la imagen', () => {
    expect(expandirCajaRecorte({ x: 0, y: 0, ancho: 10, alto: 20 }, 300, 300)).toEqual({
      x: 0,
      y: 0,
      ancho: 55,
      alto: 110
    });
  });

  it('deja intacta una caja que ya supera el minimo', () => {
    expect(expandirCajaRecorte({ x: 10, y: 20, ancho: 150, alto: 120 }, 400, 400)).toEqual({
      x: 10,
      y: 20,
      ancho: 150,
      alto: 120
    });
  });
});
