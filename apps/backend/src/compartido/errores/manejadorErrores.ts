/**
 * Middleware de manejo de errores para el API.
 *
 * Contrato:
 * - `ErrorAplicacion` se serializa tal cual (codigo/estado/detalles).
 * - Errores de body-parser (JSON y binario de imagenes): 413
 *   `PAYLOAD_DEMASIADO_GRANDE` con el limite en bytes, 400 `JSON_INVALIDO`,
 *   415 `CODIFICACION_NO_SOPORTADA`.
 * - `ErrorAlmacenNoDisponible` que escapa de un controlador: 503
 *   `LIMITES_NO_DISPONIBLE`, igual que la comprobacion previa de `/limites`.
 * - Para errores no esperados, se registra (excepto en tests) y se devuelve 500.
 *
 * Nota: el formato del envelope de error es parte del contrato publico del API.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from './errorAplicacion';
import { logError } from '../../infraestructura/logging/logger';
import { ErrorAlmacenNoDisponible } from '../../modulos/modulo_limite_tasa/almacenContadores';

function obtenerStatusYTipo(error: unknown): { status: unknown; type: unknown } {
  if (typeof error !== 'object' || !error) {
    return { status: undefined, type: undefined };
  }
  return {
    status: Reflect.get(error, 'status') ?? Reflect.get(error, 'statusCode'),
    type: Reflect.get(error, 'type')
  };
}

function esPayloadDemasiadoGrande(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 413 || type === 'entity.too.large';
}

function esJsonMalFormado(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 400 && type === 'entity.parse.failed';
}

function esCodificacionNoSoportada(error: unknown): boolean {
  const { status, type } = obtenerStatusYTipo(error);
  return status === 415 || type === 'charset.unsupported' || type === 'encoding.unsupported';
}

function limiteBytes(error: unknown): number | undefined {
  if (typeof error !== 'object' || !error) return undefined;
  const limite = Reflect.get(error, 'limit');
  return typeof limite === 'number' ? limite : undefined;
}

function responderErrorSimple(res: Response, status: number, codigo: string, mensaje: string, detalles?: unknown) {
  res.status(status).json({
    error: {
      codigo,
      mensaje,
      detalles
    }
  });
}

export function manejadorErrores(error: unknown, req: Request, res: Response, _next: NextFunction) {
  void _next;

  if (esPayloadDemasiadoGrande(error)) {
    const limite = limiteBytes(error);
    responderErrorSimple(
      res,
      413,
      'PAYLOAD_DEMASIADO_GRANDE',
      'Payload demasiado grande',
      limite === undefined ? undefined : { limiteBytes: limite }
    );
    return;
  }

  if (esJsonMalFormado(error)) {
    responderErrorSimple(res, 400, 'JSON_INVALIDO', 'JSON mal formado');
    return;
  }

  if (esCodificacionNoSoportada(error)) {
    responderErrorSimple(res, 415, 'CODIFICACION_NO_SOPORTADA', 'Codificacion del cuerpo no soportada');
    return;
  }

  if (error instanceof ErrorAlmacenNoDisponible) {
    if (process.env.NODE_ENV !== 'test') {
      logError('Almacen de limites no disponible en request', error, {
        requestId: req.requestId,
        route: req.path,
        method: req.method
      });
    }
    responderErrorSimple(res, 503, 'LIMITES_NO_DISPONIBLE', 'El servicio de limites no esta disponible');
    return;
  }

  if (error instanceof ErrorAplicacion) {
    if (error.estadoHttp >= 500 && process.env.NODE_ENV !== 'test') {
      logError('Error controlado 5xx en request', error, {
        requestId: req.requestId,
        route: req.path,
        method: req.method,
        status: error.estadoHttp,
        codigo: error.codigo
      });
    }

    res.status(error.estadoHttp).json({
      error: {
        codigo: error.codigo,
        mensaje: error.message,
        detalles: error.detalles
      }
    });
    return;
  }

  // Errores no esperados: se registran para diagnostico y se responde con un
  // mensaje generico al cliente.
  const entorno = process.env.NODE_ENV;
  if (entorno !== 'test') {
    logError('Error no controlado en request', error, {
      requestId: req.requestId,
      route: req.path,
      method: req.method
    });
  }

  const exponerMensaje = entorno !== 'production';
  const mensaje = exponerMensaje && error instanceof Error ? error.message : 'Error interno';
  responderErrorSimple(res, 500, 'ERROR_INTERNO', mensaje);
}
