/**
 * Controlador de consulta y administracion de limites.
 *
 * El reinicio de contadores es una politica del llamador: solo el plan
 * `enterprise` puede pedirlo, y solo sobre su propio identificador.
 */
import type { Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { identificadorLimite, type IdentidadSolicitud } from '../../compartido/identidad/resolutorIdentidad';
import type { LimitadorTasa } from './limitadorTasa';
import { normalizarRuta } from './middlewareLimiteTasa';
import { describirPlan, obtenerLimitesPlan } from './politicaPlanes';

function requerirUsuario(req: Request): IdentidadSolicitud & { usuarioId: string } {
  const identidad = req.identidad;
  if (!identidad?.usuarioId) {
    throw new ErrorAplicacion('NO_AUTORIZADO', 'Se requiere un usuario autenticado', 401);
  }
  return { ...identidad, usuarioId: identidad.usuarioId };
}

async function requerirAlmacenDisponible(limitador: LimitadorTasa) {
  if (!(await limitador.estaDisponible())) {
    throw new ErrorAplicacion('LIMITES_NO_DISPONIBLE', 'El servicio de limites no esta disponible', 503);
  }
}

export function crearControladorLimiteTasa(limitador: LimitadorTasa) {
  return {
    async uso(req: Request, res: Response) {
      const identidad = requerirUsuario(req);
      await requerirAlmacenDisponible(limitador);
      const endpoint =
        typeof req.query.endpoint === 'string' && req.query.endpoint ? normalizarRuta(req.query.endpoint) : undefined;
      const estadisticas = await limitador.estadisticasUso(identificadorLimite(identidad), identidad.plan, endpoint);
      res.json({ usuarioId: identidad.usuarioId, plan: identidad.plan, endpoint: endpoint ?? null, estadisticas });
    },

    planes(req: Request, res: Response) {
      const identidad = requerirUsuario(req);
      res.json({
        plan: identidad.plan,
        limites: obtenerLimitesPlan(identidad.plan),
        descripcion: describirPlan(identidad.plan)
      });
    },

    async reiniciar(req: Request, res: Response) {
      const identidad = requerirUsuario(req);
      if (identidad.plan !== 'enterprise') {
        throw new ErrorAplicacion('PROHIBIDO', 'Solo el plan enterprise puede reiniciar limites', 403);
      }
      await requerirAlmacenDisponible(limitador);
      const reiniciado = await limitador.reiniciar(identificadorLimite(identidad));
      if (!reiniciado) {
        throw new ErrorAplicacion('LIMITES_REINICIO_FALLIDO', 'No se pudieron reiniciar los limites', 500);
      }
      res.json({ mensaje: 'Limites reiniciados' });
    },

    async estado(_req: Request, res: Response) {
      const disponible = await limitador.estaDisponible();
      res.json({
        estadoServicio: disponible ? 'disponible' : 'no_disponible',
        almacen: limitador.tipoAlmacen,
        almacenConectado: disponible,
        mensaje: disponible ? 'Servicio de limites operativo' : 'Servicio de limites caido'
      });
    }
  };
}
