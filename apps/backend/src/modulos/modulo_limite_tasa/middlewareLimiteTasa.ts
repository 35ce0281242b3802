/**
 * Middleware HTTP de limites por plan.
 *
 * Se consulta antes de cualquier trabajo del nucleo. Rutas de salud y metricas
 * quedan fuera. Si el almacen esta caido la solicitud continua con
 * `X-RateLimit-Status: disabled`.
 *
 * Corre antes del enrutado, asi que el contador se elige con la ruta en forma
 * canonica (la que Express considera equivalente: sin mayusculas, sin barras
 * repetidas ni barra final). Con `endpointsConocidos`, cualquier ruta fuera de
 * la lista cuenta en una sola cubeta comun.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { identificadorLimite } from '../../compartido/identidad/resolutorIdentidad';
import type { LimitadorTasa } from './limitadorTasa';

const RUTAS_EXCLUIDAS = ['/api/salud', '/api/metrics'];

export const ENDPOINT_DESCONOCIDO = '*';

export type EndpointLimitado = { metodo: string; ruta: string };

export type OpcionesMiddlewareLimiteTasa = {
  endpointsConocidos?: readonly EndpointLimitado[];
};

export function normalizarRuta(url: string) {
  const ruta = (url.split('?')[0] ?? '').toLowerCase().replace(/\/{2,}/g, '/');
  if (!ruta) return '/';
  return ruta.length > 1 && ruta.endsWith('/') ? ruta.slice(0, -1) : ruta;
}

function claveEndpoint(metodo: string, ruta: string) {
  // Express atiende HEAD con el manejador GET.
  const verbo = metodo.toUpperCase();
  return `${verbo === 'HEAD' ? 'GET' : verbo} ${normalizarRuta(ruta)}`;
}

function debeOmitirse(ruta: string) {
  if (!ruta.startsWith('/api/')) return true;
  return RUTAS_EXCLUIDAS.some((excluida) => ruta === excluida || ruta.startsWith(`${excluida}/`));
}

export function middlewareLimiteTasa(limitador: LimitadorTasa, opciones: OpcionesMiddlewareLimiteTasa = {}) {
  const conocidos = opciones.endpointsConocidos
    ? new Set(opciones.endpointsConocidos.map((e) => claveEndpoint(e.metodo, e.ruta)))
    : undefined;

  return async (req: Request, res: Response, next: NextFunction) => {
    const ruta = normalizarRuta(req.originalUrl);
    if (debeOmitirse(ruta) || !req.identidad) {
      next();
      return;
    }

    const endpoint = !conocidos || conocidos.has(claveEndpoint(req.method, ruta)) ? ruta : ENDPOINT_DESCONOCIDO;
    const decision = await limitador.verificar(identificadorLimite(req.identidad), req.identidad.plan, endpoint);

    if (decision.limitacionDeshabilitada) {
      res.setHeader('X-RateLimit-Status', 'disabled');
      res.setHeader('X-RateLimit-Reason', 'store-unavailable');
      next();
      return;
    }

    res.setHeader('X-RateLimit-Limit', String(decision.limite));
    res.setHeader('X-RateLimit-Remaining', String(decision.restantes));
    res.setHeader('X-RateLimit-Reset', String(decision.reinicio));

    if (!decision.permitido) {
      res.setHeader('Retry-After', String(decision.reintentarEn ?? 0));
      next(
        new ErrorAplicacion(
          'LIMITE_TASA_EXCEDIDO',
          `Demasiadas solicitudes. Limite: ${decision.limite} solicitudes por ${decision.tipoLimite}`,
          429,
          {
            tipoLimite: decision.tipoLimite,
            limite: decision.limite,
            reintentarEn: decision.reintentarEn,
            reinicio: decision.reinicio
          }
        )
      );
      return;
    }

    if (decision.conteos) {
      res.setHeader('X-RateLimit-Count-Minute', String(decision.conteos.minute));
      res.setHeader('X-RateLimit-Count-Hour', String(decision.conteos.hour));
      res.setHeader('X-RateLimit-Count-Day', String(decision.conteos.day));
    }
    next();
  };
}
