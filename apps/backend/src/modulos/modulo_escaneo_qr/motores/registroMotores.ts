/**
 * Seleccion de motores al arranque.
 *
 * El orden de `MOTORES_CONOCIDOS` es la prioridad. Se conservan los motores
 * habilitados por configuracion que reportan estar disponibles.
 */
import { log } from '../../../infraestructura/logging/logger';
import type { MotorCodigoBarras } from '../tiposEscaneo';
import { MotorJsqr } from './motorJsqr';
import { MotorZxing } from './motorZxing';

export const MOTORES_CONOCIDOS: ReadonlyArray<() => MotorCodigoBarras> = [() => new MotorJsqr(), () => new MotorZxing()];

export function seleccionarMotores(
  candidatos: ReadonlyArray<MotorCodigoBarras>,
  habilitados?: ReadonlyArray<string>
): MotorCodigoBarras[] {
  const seleccionados = candidatos.filter((motor) => {
    if (habilitados && !habilitados.includes(motor.nombre)) return false;
    if (!motor.disponible()) {
      log('warn', 'Motor de lectura no disponible; se omite', { motor: motor.nombre });
      return false;
    }
    return true;
  });
  log('info', 'Motores de lectura QR seleccionados', { motores: seleccionados.map((m) => m.nombre) });
  return seleccionados;
}

export function crearMotoresPorDefecto(habilitados?: ReadonlyArray<string>) {
  return seleccionarMotores(
    MOTORES_CONOCIDOS.map((crear) => crear()),
    habilitados
  );
}
