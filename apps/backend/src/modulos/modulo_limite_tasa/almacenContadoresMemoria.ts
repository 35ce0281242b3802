/**
 * Almacen de contadores en memoria del proceso.
 *
 * Cada operacion corre completa dentro de un solo turno del event loop, asi que
 * revision + incremento no se intercalan entre solicitudes concurrentes del
 * mismo proceso. No comparte estado entre procesos: solo desarrollo y pruebas.
 *
 * Las claves expiradas que nadie vuelve a leer se barren desde `consumir`, a lo
 * sumo una vez por `intervaloBarridoMs`.
 */
import type { AlmacenContadores, ResultadoConsumo, VentanaContador } from './almacenContadores';

type Entrada = { valor: number; expiraEnMs: number };

export class AlmacenContadoresMemoria implements AlmacenContadores {
  readonly tipo = 'memoria' as const;
  private readonly entradas = new Map<string, Entrada>();
  private proximoBarridoMs = 0;

  constructor(
    private readonly reloj: () => number = Date.now,
    private readonly intervaloBarridoMs = 60_000
  ) {}

  /** Entradas guardadas, incluidas las expiradas que aun no se barren. */
  get tamano() {
    return this.entradas.size;
  }

  private barrerExpiradas(ahora: number) {
    if (ahora < this.proximoBarridoMs) return;
    for (const [clave, entrada] of this.entradas) {
      if (entrada.expiraEnMs <= ahora) this.entradas.delete(clave);
    }
    this.proximoBarridoMs = ahora + this.intervaloBarridoMs;
  }

  private vigente(clave: string): Entrada | undefined {
    const entrada = this.entradas.get(clave);
    if (!entrada) return undefined;
    if (entrada.expiraEnMs <= this.reloj()) {
      this.entradas.delete(clave);
      return undefined;
    }
    return entrada;
  }

  async consumir(ventanas: VentanaContador[]): Promise<ResultadoConsumo> {
    this.barrerExpiradas(this.reloj());
    const actuales = ventanas.map((ventana) => this.vigente(ventana.clave)?.valor ?? 0);
    for (let i = 0; i < ventanas.length; i += 1) {
      if (actuales[i] >= ventanas[i].limite) {
        return { admitido: false, indiceBloqueado: i, conteo: actuales[i] };
      }
    }
    const ahora = this.reloj();
    const conteos = ventanas.map((ventana, i) => {
      const valor = actuales[i] + 1;
      this.entradas.set(ventana.clave, { valor, expiraEnMs: ahora + ventana.ttlSegundos * 1000 });
      return valor;
    });
    return { admitido: true, conteos };
  }

  async leer(claves: string[]): Promise<number[]> {
    return claves.map((clave) => this.vigente(clave)?.valor ?? 0);
  }

  async eliminarPorPrefijo(prefijo: string): Promise<number> {
    let eliminadas = 0;
    for (const clave of Array.from(this.entradas.keys())) {
      if (clave.startsWith(prefijo)) {
        this.entradas.delete(clave);
        eliminadas += 1;
      }
    }
    return eliminadas;
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
