/**
 * escaneo.pipeline.test
 *
 * Responsabilidad: Orden de la cascada, tolerancia a motores que fallan y
 * reescalado de coordenadas con motores simulados.
 */
import { describe, expect, it, vi, type Mock } from 'vitest';
import { PipelineDecodificacion, generarPasadas } from '../src/modulos/modulo_escaneo_qr/pipelineDecodificacion';
import { seleccionarMotores } from '../src/modulos/modulo_escaneo_qr/motores/registroMotores';
import {
  MENSAJE_SIN_QR,
  type Imagen,
  type MotorCodigoBarras,
  type SimboloDecodificado
} from '../src/modulos/modulo_escaneo_qr/tiposEscaneo';

function imagenRgba(ancho: number, alto: number): Imagen {
  return { ancho, alto, canales: 4, datos: new Uint8ClampedArray(ancho * alto * 4).fill(255) };
}

function motorFalso(
  nombre: string,
  reportaGeometria: boolean,
  decodificar: (imagen: Imagen) => SimboloDecodificado[]
): MotorCodigoBarras & { decodificar: Mock<(imagen: Imagen) => SimboloDecodificado[]> } {
  return { nombre, reportaGeometria, disponible: () => true, decodificar: vi.fn(decodificar) };
}

const PASADAS_EXTENDIDAS = [
  'directa',
  'grises',
  'otsu',
  'mascara_logo',
  'umbral_binario',
  'umbral_binario_inv',
  'umbral_truncado',
  'umbral_a_cero',
  'umbral_a_cero_inv',
  'adaptativo_11_2',
  'adaptativo_11_5',
  'adaptativo_11_10',
  'adaptativo_15_2',
  'adaptativo_15_5',
  'adaptativo_15_10',
  'adaptativo_19_2',
  'adaptativo_19_5',
  'adaptativo_19_10',
  'cierre'
];

describe('generarPasadas', () => {
  it('produce las pasadas en orden fijo', () => {
    const original = imagenRgba(20, 20);
    const gris: Imagen = { ancho: 20, alto: 20, canales: 1, datos: new Uint8ClampedArray(400).fill(255) };
    expect(Array.from(generarPasadas(original, gris, true), (p) => p.nombre)).toEqual(PASADAS_EXTENDIDAS);
    expect(Array.from(generarPasadas(original, gris, false), (p) => p.nombre)).toEqual(['directa', 'grises', 'otsu']);
  });
});

describe('PipelineDecodificacion', () => {
  it('recorre toda la cascada y reporta el mensaje de "sin QR"', () => {
    const primario = motorFalso('a', true, () => []);
    const respaldo = motorFalso('b', false, () => {
      throw new Error('fallo interno del motor');
    });
    const pipeline = new PipelineDecodificacion([primario, respaldo]);

    const resultado = pipeline.decodificar(imagenRgba(20, 20));

    expect(resultado).toEqual({ simbolos: [], mensajeError: MENSAJE_SIN_QR });
    // 1 intento directo + 19 pasadas por motor.
    expect(primario.decodificar).toHaveBeenCalledTimes(20);
    expect(respaldo.decodificar).toHaveBeenCalledTimes(20);
  });

  it('sin pasadas extendidas solo intenta directa, grises y Otsu', () => {
    const motor = motorFalso('a', true, () => []);
    new PipelineDecodificacion([motor], { pasadasExtendidas: false }).decodificar(imagenRgba(20, 20));
    expect(motor.decodificar).toHaveBeenCalledTimes(4);
  });

  it('el primario solo acepta simbolos QR; el respaldo acepta cualquiera', () => {
    const barras: SimboloDecodificado = { texto: '12345670', formato: 'OTRO', formatoOriginal: 'EAN_8', motor: 'x' };
    const primario = motorFalso('a', true, () => [{ ...barras, motor: 'a' }]);
    const respaldo = motorFalso('b', false, () => [{ ...barras, motor: 'b' }]);

    const resultado = new PipelineDecodificacion([primario, respaldo]).decodificar(imagenRgba(20, 20));

    expect(resultado.intento).toEqual({ motor: 'b', pasada: 'respaldo' });
    expect(resultado.simbolos).toEqual([{ ...barras, motor: 'b' }]);
    expect(primario.decodificar).toHaveBeenCalledTimes(1);
  });

  it('se detiene en el primer exito y devuelve coordenadas en la escala original', () => {
    // Solo la pasada Otsu (escalada a 200 px) "encuentra" el simbolo.
    const motor = motorFalso('a', true, (imagen) =>
      imagen.ancho === 200
        ? [
            {
              texto: 'hola',
              formato: 'QR',
              motor: 'a',
              cajaDelimitadora: { x: 20, y: 40, ancho: 60, alto: 80 },
              poligono: [{ x: 20, y: 40 }]
            }
          ]
        : []
    );

    const resultado = new PipelineDecodificacion([motor]).decodificar(imagenRgba(100, 100));

    expect(resultado.intento).toEqual({ motor: 'a', pasada: 'otsu' });
    expect(resultado.simbolos[0]?.cajaDelimitadora).toEqual({ x: 10, y: 20, ancho: 30, alto: 40 });
    expect(resultado.simbolos[0]?.poligono).toEqual([{ x: 10, y: 20 }]);
    // primario + directa + grises + otsu
    expect(motor.decodificar).toHaveBeenCalledTimes(4);
  });

  it('el primario recibe la imagen en grises', () => {
    const motor = motorFalso('a', true, () => []);
    new PipelineDecodificacion([motor], { pasadasExtendidas: false }).decodificar(imagenRgba(10, 10));
    expect(motor.decodificar.mock.calls[0]?.[0]).toEqual(expect.objectContaining({ canales: 1, ancho: 10 }));
  });
});

describe('seleccionarMotores', () => {
  it('respeta la lista habilitada y descarta motores no disponibles', () => {
    const a = motorFalso('jsqr', true, () => []);
    const b = motorFalso('zxing', false, () => []);
    const caido: MotorCodigoBarras = { ...motorFalso('otro', false, () => []), disponible: () => false };

    expect(seleccionarMotores([a, b, caido], ['zxing']).map((m) => m.nombre)).toEqual(['zxing']);
    expect(seleccionarMotores([a, b, caido]).map((m) => m.nombre)).toEqual(['jsqr', 'zxing']);
  });
});
