/**
 * Politica de limites por plan de suscripcion.
 *
 * El servicio solo conoce el mapeo plan -> topes; la asignacion del plan a un
 * usuario la resuelve facturacion fuera de este servicio.
 */
export const PLANES = ['free', 'pro', 'business', 'enterprise'] as const;
export type PlanSuscripcion = (typeof PLANES)[number];

export const VENTANAS = ['minute', 'hour', 'day'] as const;
export type VentanaLimite = (typeof VENTANAS)[number];

export type LimitesPlan = {
  per_minute: number;
  per_hour: number;
  per_day: number;
};

export const DURACION_VENTANA_SEG: Record<VentanaLimite, number> = {
  minute: 60,
  hour: 3600,
  day: 86400
};

const LIMITES_POR_PLAN: Record<PlanSuscripcion, LimitesPlan> = {
  free: { per_minute: 10, per_hour: 100, per_day: 1000 },
  pro: { per_minute: 60, per_hour: 1000, per_day: 10000 },
  business: { per_minute: 120, per_hour: 5000, per_day: 50000 },
  enterprise: { per_minute: 300, per_hour: 20000, per_day: 200000 }
};

const DESCRIPCION_POR_PLAN: Record<PlanSuscripcion, string> = {
  free: 'Plan gratuito con limites basicos para uso personal',
  pro: 'Plan pro con limites ampliados para profesionales',
  business: 'Plan business con limites altos para negocios en crecimiento',
  enterprise: 'Plan enterprise con limites maximos y soporte prioritario'
};

export function esPlan(valor: unknown): valor is PlanSuscripcion {
  return typeof valor === 'string' && (PLANES as readonly string[]).includes(valor);
}

/**
 * Cualquier plan desconocido (o ausente) se trata como `free`.
 */
export function normalizarPlan(valor: unknown): PlanSuscripcion {
  const texto = typeof valor === 'string' ? valor.trim().toLowerCase() : '';
  return esPlan(texto) ? texto : 'free';
}

export function obtenerLimitesPlan(plan: unknown): LimitesPlan {
  return { ...LIMITES_POR_PLAN[normalizarPlan(plan)] };
}

export function limiteVentana(limites: LimitesPlan, ventana: VentanaLimite) {
  if (ventana === 'minute') return limites.per_minute;
  if (ventana === 'hour') return limites.per_hour;
  return limites.per_day;
}

export function describirPlan(plan: unknown) {
  return esPlan(plan) ? DESCRIPCION_POR_PLAN[plan] : 'Plan desconocido';
}
