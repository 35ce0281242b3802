/**
 * Validacion Zod en el borde HTTP.
 *
 * Todo rechazo sale como `VALIDACION` (400) con `detalles.origen`
 * ('cuerpo' | 'consulta') y los errores por campo. Los controladores reciben
 * los valores ya coercionados por el schema.
 */
import type { NextFunction, Request, Response } from 'express';
import type { ZodError, ZodTypeAny, z } from 'zod';
import { ErrorAplicacion } from '../errores/errorAplicacion';

type OrigenEntrada = 'cuerpo' | 'consulta';

function errorValidacion(origen: OrigenEntrada, error: ZodError) {
  const { fieldErrors, formErrors } = error.flatten();
  return new ErrorAplicacion('VALIDACION', origen === 'cuerpo' ? 'Cuerpo invalido' : 'Consulta invalida', 400, {
    origen,
    campos: fieldErrors,
    generales: formErrors
  });
}

export function validarCuerpo(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = schema.safeParse(req.body);
    if (!resultado.success) {
      next(errorValidacion('cuerpo', resultado.error));
      return;
    }
    req.body = resultado.data;
    next();
  };
}

/**
 * En Express 5 `req.query` es de solo lectura; la consulta validada llega al
 * manejador como tercer argumento.
 */
export function conConsulta<T extends ZodTypeAny>(
  schema: T,
  manejador: (req: Request, res: Response, consulta: z.output<T>) => Promise<void> | void
) {
  return async (req: Request, res: Response) => {
    const resultado = schema.safeParse(req.query);
    if (!resultado.success) throw errorValidacion('consulta', resultado.error);
    await manejador(req, res, resultado.data);
  };
}
