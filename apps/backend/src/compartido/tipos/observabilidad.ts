/**
 * observabilidad
 *
 * Responsabilidad: Contratos de respuesta de los endpoints de salud.
 * Limites: Mantener nombres estables; los consumen balanceadores y monitoreo.
 */
export type EstadoAlmacen = {
  tipo: 'memoria' | 'redis';
  conectado: boolean;
};

export type RespuestaSalud = {
  estado: 'ok' | 'degradado';
  tiempoActivo: number;
};

export type RespuestaLiveness = RespuestaSalud & {
  servicio: string;
  env: string;
};

export type RespuestaReadiness = RespuestaSalud & {
  dependencias: {
    almacenLimites: EstadoAlmacen & { lista: boolean };
  };
};
