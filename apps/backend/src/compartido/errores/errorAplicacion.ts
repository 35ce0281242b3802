/**
 * Error estandar para respuestas controladas del API.
 *
 * Envelope serializado por `manejadorErrores`:
 * `{ error: { codigo, mensaje, detalles? } }`.
 *
 * `codigo` es estable (orientado a maquina); `detalles` lleva p. ej. los
 * errores por campo de una validacion o la guia de reintento de un limite.
 */
import type { ErrorNucleo, TipoErrorNucleo } from '../tipos/resultado';

const ESTADO_POR_TIPO: Record<TipoErrorNucleo, number> = {
  ENTRADA_INVALIDA: 400,
  CAPACIDAD_EXCEDIDA: 422,
  RENDER_FALLIDO: 500
};

export class ErrorAplicacion extends Error {
  codigo: string;
  estadoHttp: number;
  detalles?: unknown;

  constructor(codigo: string, mensaje: string, estadoHttp = 400, detalles?: unknown) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.codigo = codigo;
    this.estadoHttp = estadoHttp;
    this.detalles = detalles;
  }

  /**
   * Traduce un fallo estructurado del nucleo (decode/render) al envelope HTTP.
   */
  static desdeNucleo(error: ErrorNucleo, detalles?: unknown) {
    return new ErrorAplicacion(error.tipo, error.mensaje, ESTADO_POR_TIPO[error.tipo], detalles);
  }
}
