/**
 * Limitador de tasa por plan con tres ventanas fijas (minuto/hora/dia).
 *
 * - Las ventanas estan alineadas al calendario: cubeta = floor(ahora / duracion).
 *   En el borde de una ventana puede pasar hasta 2x el tope; es aceptado.
 * - Precedencia estricta minuto > hora > dia al reportar un bloqueo.
 * - Si el almacen falla, la solicitud pasa ("fail open") marcada con
 *   `limitacionDeshabilitada`.
 */
import { log } from '../../infraestructura/logging/logger';
import { registrarDecisionLimite, registrarLimiteFailOpen } from '../../compartido/observabilidad/metrics';
import type { AlmacenContadores, ResultadoConsumo, VentanaContador } from './almacenContadores';
import {
  DURACION_VENTANA_SEG,
  VENTANAS,
  limiteVentana,
  normalizarPlan,
  obtenerLimitesPlan,
  type LimitesPlan,
  type PlanSuscripcion,
  type VentanaLimite
} from './politicaPlanes';

export type ConteosVentanas = Record<VentanaLimite, number>;

export type DecisionLimite = {
  permitido: boolean;
  tipoLimite: VentanaLimite;
  limite: number;
  restantes: number;
  /** Epoch en segundos del inicio de la siguiente ventana. */
  reinicio: number;
  /** Segundos hasta `reinicio` cuando se bloquea; `null` si se admite. */
  reintentarEn: number | null;
  conteos?: ConteosVentanas;
  limitacionDeshabilitada?: boolean;
};

export type EstadisticasUso = {
  plan: PlanSuscripcion;
  limites: LimitesPlan;
  usoActual: ConteosVentanas;
  restantes: ConteosVentanas;
  reinicios: ConteosVentanas;
};

export type OpcionesLimitador = {
  prefijo?: string;
  /** Reloj en milisegundos; inyectable para pruebas. */
  reloj?: () => number;
};

/**
 * El identificador puede traer `:` (`ip:::1`, `user:a:b`); se escapa para que
 * `<prefijo>:<identificador>:` nunca sea prefijo de las claves de otro.
 */
export function segmentoIdentificador(identificador: string) {
  return identificador.replace(/%/g, '%25').replace(/:/g, '%3A');
}

function reinicioVentana(ahoraSeg: number, ventana: VentanaLimite) {
  const duracion = DURACION_VENTANA_SEG[ventana];
  return (Math.floor(ahoraSeg / duracion) + 1) * duracion;
}

export class LimitadorTasa {
  private readonly prefijo: string;
  private readonly reloj: () => number;

  constructor(
    private readonly almacen: AlmacenContadores,
    opciones: OpcionesLimitador = {}
  ) {
    this.prefijo = opciones.prefijo ?? 'rate_limit';
    this.reloj = opciones.reloj ?? Date.now;
  }

  get tipoAlmacen() {
    return this.almacen.tipo;
  }

  private ahoraSegundos() {
    return Math.floor(this.reloj() / 1000);
  }

  /**
   * `<prefijo>:<identificador>:<ventana>:<cubeta>[:<endpoint>]`, con el
   * identificador escapado por `segmentoIdentificador`.
   */
  construirClave(identificador: string, ventana: VentanaLimite, ahoraSeg: number, endpoint?: string) {
    const cubeta = Math.floor(ahoraSeg / DURACION_VENTANA_SEG[ventana]);
    const base = `${this.prefijo}:${segmentoIdentificador(identificador)}:${ventana}:${cubeta}`;
    return endpoint ? `${base}:${endpoint}` : base;
  }

  async verificar(identificador: string, plan: unknown = 'free', endpoint?: string): Promise<DecisionLimite> {
    const planEfectivo = normalizarPlan(plan);
    const limites = obtenerLimitesPlan(planEfectivo);
    const ahoraSeg = this.ahoraSegundos();
    const ventanas: VentanaContador[] = VENTANAS.map((ventana) => ({
      clave: this.construirClave(identificador, ventana, ahoraSeg, endpoint),
      limite: limiteVentana(limites, ventana),
      ttlSegundos: DURACION_VENTANA_SEG[ventana]
    }));

    let consumo: ResultadoConsumo;
    try {
      consumo = await this.almacen.consumir(ventanas);
    } catch (error) {
      registrarLimiteFailOpen();
      log('warn', 'Almacen de limites no disponible; se permite la solicitud', {
        identificador,
        almacen: this.almacen.tipo,
        motivo: error instanceof Error ? error.message : String(error)
      });
      return {
        permitido: true,
        tipoLimite: 'minute',
        limite: limites.per_minute,
        restantes: limites.per_minute,
        reinicio: reinicioVentana(ahoraSeg, 'minute'),
        reintentarEn: null,
        limitacionDeshabilitada: true
      };
    }

    if (!consumo.admitido) {
      const ventana = VENTANAS[consumo.indiceBloqueado] ?? 'minute';
      const reinicio = reinicioVentana(ahoraSeg, ventana);
      registrarDecisionLimite(false, ventana);
      return {
        permitido: false,
        tipoLimite: ventana,
        limite: limiteVentana(limites, ventana),
        restantes: 0,
        reinicio,
        reintentarEn: reinicio - ahoraSeg
      };
    }

    const [minuto = 0, hora = 0, dia = 0] = consumo.conteos;
    registrarDecisionLimite(true, 'minute');
    return {
      permitido: true,
      tipoLimite: 'minute',
      limite: limites.per_minute,
      restantes: Math.min(limites.per_minute - minuto, limites.per_hour - hora, limites.per_day - dia),
      reinicio: reinicioVentana(ahoraSeg, 'minute'),
      reintentarEn: null,
      conteos: { minute: minuto, hour: hora, day: dia }
    };
  }

  /**
   * Uso de las tres ventanas. Sin `endpoint` se leen los contadores globales
   * del identificador; el middleware cuenta por ruta, asi que para ver el
   * consumo de una ruta hay que pasarla.
   * Propaga `ErrorAlmacenNoDisponible`: quien consulta decide como responder.
   */
  async estadisticasUso(identificador: string, plan: unknown = 'free', endpoint?: string): Promise<EstadisticasUso> {
    const planEfectivo = normalizarPlan(plan);
    const limites = obtenerLimitesPlan(planEfectivo);
    const ahoraSeg = this.ahoraSegundos();
    const claves = VENTANAS.map((ventana) => this.construirClave(identificador, ventana, ahoraSeg, endpoint));
    const [minuto = 0, hora = 0, dia = 0] = await this.almacen.leer(claves);

    return {
      plan: planEfectivo,
      limites,
      usoActual: { minute: minuto, hour: hora, day: dia },
      restantes: {
        minute: Math.max(0, limites.per_minute - minuto),
        hour: Math.max(0, limites.per_hour - hora),
        day: Math.max(0, limites.per_day - dia)
      },
      reinicios: {
        minute: reinicioVentana(ahoraSeg, 'minute'),
        hour: reinicioVentana(ahoraSeg, 'hour'),
        day: reinicioVentana(ahoraSeg, 'day')
      }
    };
  }

  /**
   * Borra todos los contadores del identificador (todas las ventanas y endpoints).
   */
  async reiniciar(identificador: string): Promise<boolean> {
    try {
      const prefijoIdentificador = `${this.prefijo}:${segmentoIdentificador(identificador)}:`;
      const eliminadas = await this.almacen.eliminarPorPrefijo(prefijoIdentificador);
      log('info', 'Limites reiniciados', { identificador, eliminadas });
      return true;
    } catch (error) {
      log('warn', 'No se pudieron reiniciar los limites', {
        identificador,
        motivo: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }

  estaDisponible() {
    return this.almacen.ping();
  }
}
