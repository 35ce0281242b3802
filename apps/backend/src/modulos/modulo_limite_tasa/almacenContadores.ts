/**
 * Contrato del almacen compartido de contadores de limite de tasa.
 *
 * `consumir` es la unica operacion de escritura: revisa todas las ventanas en
 * orden y, solo si ninguna esta en su tope, incrementa todas (renovando TTL).
 * Las implementaciones deben ejecutar revision + incremento como una unidad
 * atomica por llamada; el servicio puede correr con varios procesos.
 */
export type VentanaContador = {
  clave: string;
  limite: number;
  ttlSegundos: number;
};

export type ResultadoConsumo =
  | { admitido: true; conteos: number[] }
  | { admitido: false; indiceBloqueado: number; conteo: number };

export interface AlmacenContadores {
  readonly tipo: 'memoria' | 'redis';
  consumir(ventanas: VentanaContador[]): Promise<ResultadoConsumo>;
  /** Conteo actual por clave; 0 cuando no existe o ya expiro. */
  leer(claves: string[]): Promise<number[]>;
  /** Elimina todas las claves que empiezan con `prefijo`; devuelve cuantas borro. */
  eliminarPorPrefijo(prefijo: string): Promise<number>;
  ping(): Promise<boolean>;
}

/**
 * Error de dependencia: el almacen no respondio. El limitador lo convierte en
 * degradacion "fail open".
 */
export class ErrorAlmacenNoDisponible extends Error {
  code = 'ALMACEN_CONTADORES_NO_DISPONIBLE' as const;

  constructor(mensaje: string, options?: { cause?: unknown }) {
    super(mensaje, options);
    this.name = 'ErrorAlmacenNoDisponible';
  }
}
