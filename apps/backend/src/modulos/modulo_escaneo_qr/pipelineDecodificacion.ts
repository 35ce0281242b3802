/**
 * Cascada de decodificacion.
 *
 * Orden estricto, se detiene en el primer exito:
 * 1. Motor primario (reporta geometria) sobre la imagen en grises; solo simbolos QR.
 * 2. Motor de respaldo sobre la misma imagen en grises.
 * 3. Pasadas de preprocesamiento, cada una con todos los motores en orden de
 *    prioridad: directa, grises, escala minima 200 px + Otsu y, si estan
 *    habilitadas, las pasadas extendidas (mascara de logo, umbrales fijos,
 *    umbrales adaptativos, cierre morfologico).
 *
 * Las pasadas se generan de forma perezosa: una imagen que se lee en el paso 1
 * no paga el costo de los umbrales adaptativos.
 */
import { log } from '../../infraestructura/logging/logger';
import { registrarIntentoDecodificacion } from '../../compartido/observabilidad/metrics';
import {
  TIPOS_UMBRAL,
  aEscalaGrises,
  cierreMorfologico,
  enmascararLogoCentral,
  redimensionarSiPequena,
  umbralAdaptativoGaussiano,
  umbralFijo,
  umbralOtsu
} from './preprocesamiento/preprocesadorImagen';
import {
  MENSAJE_SIN_QR,
  type Imagen,
  type MotorCodigoBarras,
  type ResultadoDecodificacion,
  type SimboloDecodificado
} from './tiposEscaneo';

export const LADO_MINIMO_OTSU_PX = 200;
export const UMBRAL_FIJO = 127;
export const BLOQUES_ADAPTATIVOS = [11, 15, 19] as const;
export const CONSTANTES_ADAPTATIVAS = [2, 5, 10] as const;

export type PasadaCascada = { nombre: string; imagen: Imagen };

export type OpcionesPipeline = {
  pasadasExtendidas?: boolean;
};

export function* generarPasadas(
  original: Imagen,
  gris: Imagen,
  extendidas: boolean
): Generator<PasadaCascada, void, undefined> {
  yield { nombre: 'directa', imagen: original };
  yield { nombre: 'grises', imagen: gris };
  yield { nombre: 'otsu', imagen: umbralOtsu(redimensionarSiPequena(gris, LADO_MINIMO_OTSU_PX)).imagen };
  if (!extendidas) return;

  yield { nombre: 'mascara_logo', imagen: enmascararLogoCentral(gris) };
  for (const tipo of TIPOS_UMBRAL) {
    yield { nombre: `umbral_${tipo}`, imagen: umbralFijo(gris, UMBRAL_FIJO, tipo) };
  }
  for (const bloque of BLOQUES_ADAPTATIVOS) {
    for (const c of CONSTANTES_ADAPTATIVAS) {
      yield { nombre: `adaptativo_${bloque}_${c}`, imagen: umbralAdaptativoGaussiano(gris, bloque, c) };
    }
  }
  yield { nombre: 'cierre', imagen: cierreMorfologico(gris, 3) };
}

// Las pasadas que cambian de tamano devuelven coordenadas en su propia escala.
function reescalarSimbolo(simbolo: SimboloDecodificado, escalaX: number, escalaY: number): SimboloDecodificado {
  if (escalaX === 1 && escalaY === 1) return simbolo;
  const caja = simbolo.cajaDelimitadora;
  return Object.freeze({
    ...simbolo,
    cajaDelimitadora: caja
      ? Object.freeze({
          x: Math.floor(caja.x * escalaX),
          y: Math.floor(caja.y * escalaY),
          ancho: Math.max(1, Math.round(caja.ancho * escalaX)),
          alto: Math.max(1, Math.round(caja.alto * escalaY))
        })
      : undefined,
    poligono: simbolo.poligono
      ? Object.freeze(simbolo.poligono.map((p) => Object.freeze({ x: p.x * escalaX, y: p.y * escalaY })))
      : undefined
  });
}

export class PipelineDecodificacion {
  private readonly primario?: MotorCodigoBarras;
  private readonly respaldo?: MotorCodigoBarras;
  private readonly pasadasExtendidas: boolean;

  constructor(
    private readonly motores: ReadonlyArray<MotorCodigoBarras>,
    opciones: OpcionesPipeline = {}
  ) {
    this.primario = motores.find((motor) => motor.reportaGeometria);
    this.respaldo = motores.find((motor) => motor !== this.primario);
    this.pasadasExtendidas = opciones.pasadasExtendidas ?? true;
  }

  get nombresMotores() {
    return this.motores.map((motor) => motor.nombre);
  }

  private intentar(motor: MotorCodigoBarras, imagen: Imagen, pasada: string): SimboloDecodificado[] {
    let simbolos: SimboloDecodificado[];
    try {
      simbolos = motor.decodificar(imagen);
    } catch (error) {
      log('debug', 'Motor de lectura fallo; se continua con la cascada', {
        motor: motor.nombre,
        pasada,
        motivo: error instanceof Error ? error.message : String(error)
      });
      simbolos = [];
    }
    registrarIntentoDecodificacion(motor.nombre, pasada, simbolos.length > 0);
    return simbolos;
  }

  decodificar(imagen: Imagen): ResultadoDecodificacion {
    const gris = aEscalaGrises(imagen);

    if (this.primario) {
      const simbolos = this.intentar(this.primario, gris, 'primario').filter((s) => s.formato === 'QR');
      if (simbolos.length > 0) return { simbolos, intento: { motor: this.primario.nombre, pasada: 'primario' } };
    }

    if (this.respaldo) {
      const simbolos = this.intentar(this.respaldo, gris, 'respaldo');
      if (simbolos.length > 0) return { simbolos, intento: { motor: this.respaldo.nombre, pasada: 'respaldo' } };
    }

    for (const pasada of generarPasadas(imagen, gris, this.pasadasExtendidas)) {
      const escalaX = imagen.ancho / pasada.imagen.ancho;
      const escalaY = imagen.alto / pasada.imagen.alto;
      for (const motor of this.motores) {
        const simbolos = this.intentar(motor, pasada.imagen, pasada.nombre);
        if (simbolos.length > 0) {
          return {
            simbolos: simbolos.map((s) => reescalarSimbolo(s, escalaX, escalaY)),
            intento: { motor: motor.nombre, pasada: pasada.nombre }
          };
        }
      }
    }

    return { simbolos: [], mensajeError: MENSAJE_SIN_QR };
  }
}
