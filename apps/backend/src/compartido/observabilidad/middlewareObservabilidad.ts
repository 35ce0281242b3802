import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { log } from '../../infraestructura/logging/logger';
import { registrarRequestHttp } from './metrics';

function obtenerIdSolicitud(req: Request): string {
  const cabecera = req.header('x-request-id');
  return cabecera && cabecera.trim() ? cabecera.trim().slice(0, 128) : randomUUID();
}

function obtenerRuta(req: Request): string {
  const base = String(req.baseUrl || '');
  const rutaDeclarada: unknown = req.route?.path;
  const ruta = typeof rutaDeclarada === 'string' ? rutaDeclarada.trim() : '';
  if (ruta) return `${base}${ruta}`;
  return String(req.path || '/');
}

export function middlewareIdSolicitud(req: Request, res: Response, next: NextFunction) {
  const idSolicitud = obtenerIdSolicitud(req);
  res.setHeader('x-request-id', idSolicitud);
  req.requestId = idSolicitud;
  next();
}

export function middlewareRegistroSolicitud(req: Request, res: Response, next: NextFunction) {
  const inicio = Date.now();
  res.on('finish', () => {
    const duracionMs = Date.now() - inicio;
    const ruta = obtenerRuta(req);
    const estatus = Number(res.statusCode || 0);

    registrarRequestHttp(req.method, ruta, estatus, duracionMs);
    log(estatus >= 500 ? 'error' : estatus >= 400 ? 'warn' : 'info', 'HTTP request', {
      requestId: req.requestId,
      route: ruta,
      method: req.method,
      status: estatus,
      durationMs: duracionMs,
      userId: req.identidad?.usuarioId
    });
  });
  next();
}
