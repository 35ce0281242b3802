/**
 * Servicio de escaneo QR: lectura de la imagen, cascada de decodificacion,
 * clasificacion del contenido y recortes opcionales.
 */
import { log } from '../../infraestructura/logging/logger';
import { registrarDecodificacion } from '../../compartido/observabilidad/metrics';
import { exito, fallo, type Resultado } from '../../compartido/tipos/resultado';
import { clasificarContenido, type ClasificacionContenido } from './clasificadorContenido';
import { bytesDesdeBase64, leerImagen, recortarSimbolo } from './lectorImagen';
import type { PipelineDecodificacion } from './pipelineDecodificacion';
import type { IntentoDecodificacion, SimboloDecodificado } from './tiposEscaneo';

export const MAXIMO_IMAGENES_LOTE = 50;

export type EstadoEscaneo = 'encontrado' | 'sin_simbolo' | 'ilegible';

export type SimboloEscaneado = SimboloDecodificado & {
  contenido: ClasificacionContenido;
  recortePngBase64?: string;
};

export type ResultadoEscaneo = {
  estado: EstadoEscaneo;
  simbolos: SimboloEscaneado[];
  mensajeError?: string;
  intento?: IntentoDecodificacion;
  dimensiones?: { ancho: number; alto: number };
  duracionMs: number;
};

export type OpcionesEscaneo = {
  /** Adjunta un PNG base64 de la region de cada simbolo. */
  incluirRecortes?: boolean;
};

export class ServicioEscaneoQr {
  constructor(
    private readonly pipeline: PipelineDecodificacion,
    private readonly reloj: () => number = Date.now
  ) {}

  async decodificarBytes(bytes: Buffer, opciones: OpcionesEscaneo = {}): Promise<ResultadoEscaneo> {
    const inicio = this.reloj();
    const lectura = await leerImagen(bytes);
    if (!lectura.ok) {
      const duracionMs = this.reloj() - inicio;
      registrarDecodificacion('ilegible', duracionMs);
      return { estado: 'ilegible', simbolos: [], mensajeError: lectura.error.mensaje, duracionMs };
    }

    const imagen = lectura.valor;
    const dimensiones = { ancho: imagen.ancho, alto: imagen.alto };
    const resultado = this.pipeline.decodificar(imagen);
    if (resultado.simbolos.length === 0) {
      const duracionMs = this.reloj() - inicio;
      registrarDecodificacion('sin_simbolo', duracionMs);
      return { estado: 'sin_simbolo', simbolos: [], mensajeError: resultado.mensajeError, dimensiones, duracionMs };
    }

    const simbolos: SimboloEscaneado[] = [];
    for (const simbolo of resultado.simbolos) {
      const caja = simbolo.cajaDelimitadora;
      simbolos.push({
        ...simbolo,
        contenido: clasificarContenido(simbolo.texto),
        recortePngBase64:
          opciones.incluirRecortes && caja ? await recortarSimbolo(bytes, caja, imagen.ancho, imagen.alto) : undefined
      });
    }

    const duracionMs = this.reloj() - inicio;
    registrarDecodificacion('encontrado', duracionMs);
    log('debug', 'QR decodificado', {
      simbolos: simbolos.length,
      motor: resultado.intento?.motor,
      pasada: resultado.intento?.pasada,
      duracionMs
    });
    return { estado: 'encontrado', simbolos, intento: resultado.intento, dimensiones, duracionMs };
  }

  /**
   * Acepta base64 con o sin prefijo data-URL. Base64 vacio o mal formado es
   * error de entrada; bytes que no forman una imagen son `ilegible`.
   */
  async decodificarBase64(cadena: string, opciones: OpcionesEscaneo = {}): Promise<Resultado<ResultadoEscaneo>> {
    const bytes = bytesDesdeBase64(cadena);
    if (!bytes.ok) return fallo(bytes.error.tipo, bytes.error.mensaje);
    return exito(await this.decodificarBytes(bytes.valor, opciones));
  }

  /**
   * Resultados en el orden de entrada. Un elemento con base64 invalido no
   * detiene el lote: se reporta como `ilegible` con el motivo.
   */
  async decodificarLote(cadenas: string[], opciones: OpcionesEscaneo = {}): Promise<Resultado<ResultadoEscaneo[]>> {
    if (cadenas.length === 0) return fallo('ENTRADA_INVALIDA', 'Se requiere al menos una imagen');
    if (cadenas.length > MAXIMO_IMAGENES_LOTE) {
      return fallo('ENTRADA_INVALIDA', `El lote admite como maximo ${MAXIMO_IMAGENES_LOTE} imagenes`);
    }

    const resultados: ResultadoEscaneo[] = [];
    for (const cadena of cadenas) {
      const resultado = await this.decodificarBase64(cadena, opciones);
      resultados.push(
        resultado.ok
          ? resultado.valor
          : { estado: 'ilegible', simbolos: [], mensajeError: resultado.error.mensaje, duracionMs: 0 }
      );
    }
    return exito(resultados);
  }
}
