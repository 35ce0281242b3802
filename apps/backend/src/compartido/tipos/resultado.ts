/**
 * Resultado valor-o-error de las operaciones del nucleo.
 *
 * Las funciones de decode/render nunca lanzan por entradas invalidas: devuelven
 * `{ ok: false, error }` y el borde HTTP decide como responder.
 */
export type TipoErrorNucleo = 'ENTRADA_INVALIDA' | 'CAPACIDAD_EXCEDIDA' | 'RENDER_FALLIDO';

export type ErrorNucleo = {
  tipo: TipoErrorNucleo;
  mensaje: string;
};

export type Resultado<T> = { ok: true; valor: T } | { ok: false; error: ErrorNucleo };

export function exito<T>(valor: T): Resultado<T> {
  return { ok: true, valor };
}

export function fallo<T>(tipo: TipoErrorNucleo, mensaje: string): Resultado<T> {
  return { ok: false, error: { tipo, mensaje } };
}
