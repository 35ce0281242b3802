/**
 * Identidad de la solicitud (usuario/IP + plan).
 *
 * La autenticacion vive fuera de este servicio: un gateway resuelve la sesion
 * y reenvia `x-usuario-id` / `x-usuario-plan`. El resolutor se inyecta en
 * `crearApp` para que pruebas y despliegues puedan sustituirlo.
 */
import type { NextFunction, Request, Response } from 'express';
import { normalizarPlan, type PlanSuscripcion } from '../../modulos/modulo_limite_tasa/politicaPlanes';

export type IdentidadSolicitud = {
  usuarioId?: string;
  ip: string;
  plan: PlanSuscripcion;
};

export type ResolutorIdentidad = (req: Request) => IdentidadSolicitud;

function leerCabecera(req: Request, nombre: string) {
  const valor = req.header(nombre);
  return valor && valor.trim() ? valor.trim() : undefined;
}

export const resolutorIdentidadCabeceras: ResolutorIdentidad = (req) => {
  const usuarioId = leerCabecera(req, 'x-usuario-id');
  return {
    usuarioId,
    ip: req.ip ?? req.socket.remoteAddress ?? 'unknown',
    // Sin usuario autenticado siempre aplica el plan gratuito.
    plan: usuarioId ? normalizarPlan(leerCabecera(req, 'x-usuario-plan')) : 'free'
  };
};

/**
 * Identificador de conteo: `user:<id>` con sesion, `ip:<ip>` en anonimo.
 */
export function identificadorLimite(identidad: IdentidadSolicitud) {
  return identidad.usuarioId ? `user:${identidad.usuarioId}` : `ip:${identidad.ip}`;
}

export function middlewareIdentidad(resolutor: ResolutorIdentidad) {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.identidad = resolutor(req);
    next();
  };
}
