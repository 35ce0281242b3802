/**
 * Rutas de limites de tasa.
 */
import { Router } from 'express';
import { crearControladorLimiteTasa } from './controladorLimiteTasa';
import type { LimitadorTasa } from './limitadorTasa';

export function crearRutasLimiteTasa(limitador: LimitadorTasa) {
  const router = Router();
  const controlador = crearControladorLimiteTasa(limitador);

  router.get('/uso', controlador.uso);
  router.get('/planes', controlador.planes);
  router.post('/reiniciar', controlador.reiniciar);
  router.get('/estado', controlador.estado);

  return router;
}
