/**
 * metrics
 *
 * Responsabilidad: Punto comun de metricas para operacion (formato Prometheus).
 * Limites: Evitar romper nombres de metricas en produccion.
 */
const inicioDelProceso = Date.now();

type ClaveSolicitud = `${string}|${string}|${number}`;

const solicitudesPorRuta = new Map<ClaveSolicitud, number>();
const solicitudesTotales = { total: 0, errores: 0 };
const intentosDecodificacion = new Map<string, number>();
const decodificacionesTotales = { total: 0, encontrados: 0, sinSimbolo: 0, ilegibles: 0, duracionAcumuladaMs: 0 };
const rendersTotales = new Map<string, number>();
const advertenciasEstilo = new Map<string, number>();
const decisionesLimite = new Map<string, number>();
const limiteFailOpen = { total: 0 };

const cubetasMs = [25, 50, 100, 250, 500, 1000, 2500, 5000];
const histogramaDuracion = new Map<number, number>();

for (const cubeta of cubetasMs) histogramaDuracion.set(cubeta, 0);
histogramaDuracion.set(Infinity, 0);

function incrementar(mapa: Map<string, number>, clave: string) {
  mapa.set(clave, (mapa.get(clave) ?? 0) + 1);
}

function incrementarCubeta(duracionMs: number) {
  for (const cubeta of cubetasMs) {
    if (duracionMs <= cubeta) {
      histogramaDuracion.set(cubeta, (histogramaDuracion.get(cubeta) ?? 0) + 1);
      return;
    }
  }
  histogramaDuracion.set(Infinity, (histogramaDuracion.get(Infinity) ?? 0) + 1);
}

export function registrarRequestHttp(method: string, route: string, status: number, durationMs: number) {
  const metodo = String(method || 'GET').toUpperCase();
  const ruta = String(route || '/');
  const estatus = Number.isFinite(status) ? status : 500;
  const clave: ClaveSolicitud = `${metodo}|${ruta}|${estatus}`;
  solicitudesPorRuta.set(clave, (solicitudesPorRuta.get(clave) ?? 0) + 1);

  solicitudesTotales.total += 1;
  if (estatus >= 500) solicitudesTotales.errores += 1;
  incrementarCubeta(Math.max(0, Math.round(durationMs)));
}

export function registrarIntentoDecodificacion(motor: string, pasada: string, exito: boolean) {
  incrementar(intentosDecodificacion, `${motor}|${pasada}|${exito ? 'ok' : 'vacio'}`);
}

export function registrarDecodificacion(resultado: 'encontrado' | 'sin_simbolo' | 'ilegible', duracionMs: number) {
  decodificacionesTotales.total += 1;
  decodificacionesTotales.duracionAcumuladaMs += Math.max(0, duracionMs);
  if (resultado === 'encontrado') decodificacionesTotales.encontrados += 1;
  if (resultado === 'sin_simbolo') decodificacionesTotales.sinSimbolo += 1;
  if (resultado === 'ilegible') decodificacionesTotales.ilegibles += 1;
}

export function registrarRender(resultado: 'ok' | 'entrada_invalida' | 'capacidad_excedida' | 'render_fallido') {
  incrementar(rendersTotales, resultado);
}

export function registrarAdvertenciaEstilo(campo: string) {
  incrementar(advertenciasEstilo, campo);
}

export function registrarDecisionLimite(permitido: boolean, ventana: string) {
  incrementar(decisionesLimite, `${permitido ? 'permitido' : 'bloqueado'}|${ventana}`);
}

export function registrarLimiteFailOpen() {
  limiteFailOpen.total += 1;
}

export function exportarMetricasPrometheus(): string {
  const lineas: string[] = [];
  lineas.push('# HELP qrapi_http_requests_total Total de requests HTTP procesados');
  lineas.push('# TYPE qrapi_http_requests_total counter');
  for (const [clave, valor] of solicitudesPorRuta.entries()) {
    const [metodo, ruta, estatus] = clave.split('|');
    lineas.push(`qrapi_http_requests_total{method="${metodo}",route="${ruta}",status="${estatus}"} ${valor}`);
  }
  lineas.push('');

  lineas.push('# HELP qrapi_http_request_duration_ms_bucket Histograma simple de latencia por buckets');
  lineas.push('# TYPE qrapi_http_request_duration_ms_bucket counter');
  for (const [cubeta, valor] of histogramaDuracion.entries()) {
    const le = cubeta === Infinity ? '+Inf' : String(cubeta);
    lineas.push(`qrapi_http_request_duration_ms_bucket{le="${le}"} ${valor}`);
  }
  lineas.push('');

  lineas.push('# HELP qrapi_http_errors_total Total de respuestas 5xx');
  lineas.push('# TYPE qrapi_http_errors_total counter');
  lineas.push(`qrapi_http_errors_total ${solicitudesTotales.errores}`);
  lineas.push('');

  lineas.push('# HELP qrapi_decode_attempts_total Intentos de decodificacion por motor y pasada');
  lineas.push('# TYPE qrapi_decode_attempts_total counter');
  for (const [clave, valor] of intentosDecodificacion.entries()) {
    const [motor, pasada, resultado] = clave.split('|');
    lineas.push(`qrapi_decode_attempts_total{engine="${motor}",pass="${pasada}",result="${resultado}"} ${valor}`);
  }
  lineas.push('');

  lineas.push('# HELP qrapi_decode_total Decodificaciones por resultado');
  lineas.push('# TYPE qrapi_decode_total counter');
  lineas.push(`qrapi_decode_total{result="found"} ${decodificacionesTotales.encontrados}`);
  lineas.push(`qrapi_decode_total{result="not_found"} ${decodificacionesTotales.sinSimbolo}`);
  lineas.push(`qrapi_decode_total{result="unreadable"} ${decodificacionesTotales.ilegibles}`);
  lineas.push('# HELP qrapi_decode_duration_ms_sum Duracion acumulada de decodificacion');
  lineas.push('# TYPE qrapi_decode_duration_ms_sum counter');
  lineas.push(`qrapi_decode_duration_ms_sum ${decodificacionesTotales.duracionAcumuladaMs}`);
  lineas.push('');

  lineas.push('# HELP qrapi_render_total Renders de QR por resultado');
  lineas.push('# TYPE qrapi_render_total counter');
  for (const [resultado, valor] of rendersTotales.entries()) {
    lineas.push(`qrapi_render_total{result="${resultado}"} ${valor}`);
  }
  lineas.push('');

  lineas.push('# HELP qrapi_style_defaulted_total Opciones de estilo desconocidas reemplazadas por default');
  lineas.push('# TYPE qrapi_style_defaulted_total counter');
  for (const [campo, valor] of advertenciasEstilo.entries()) {
    lineas.push(`qrapi_style_defaulted_total{field="${campo}"} ${valor}`);
  }
  lineas.push('');

  lineas.push('# HELP qrapi_rate_limit_decisions_total Decisiones del limitador por resultado y ventana');
  lineas.push('# TYPE qrapi_rate_limit_decisions_total counter');
  for (const [clave, valor] of decisionesLimite.entries()) {
    const [resultado, ventana] = clave.split('|');
    lineas.push(`qrapi_rate_limit_decisions_total{result="${resultado}",window="${ventana}"} ${valor}`);
  }
  lineas.push('# HELP qrapi_rate_limit_fail_open_total Solicitudes admitidas con el almacen de limites caido');
  lineas.push('# TYPE qrapi_rate_limit_fail_open_total counter');
  lineas.push(`qrapi_rate_limit_fail_open_total ${limiteFailOpen.total}`);
  lineas.push('');

  lineas.push('# HELP qrapi_process_uptime_seconds Tiempo activo del proceso');
  lineas.push('# TYPE qrapi_process_uptime_seconds gauge');
  lineas.push(`qrapi_process_uptime_seconds ${Math.floor((Date.now() - inicioDelProceso) / 1000)}`);

  return lineas.join('\n');
}
