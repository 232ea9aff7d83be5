/**
 * metrics
 *
 * Responsabilidad: Contadores en proceso y exposicion en formato de texto Prometheus.
 * Limites: Evitar romper nombres de metricas en produccion; nunca etiquetar con claves de licencia.
 */
const inicioDelProceso = Date.now();

type ClaveSolicitud = `${string}|${string}|${number}`;

const solicitudesPorRuta = new Map<ClaveSolicitud, number>();
const solicitudesTotales = { total: 0, errores: 0 };
const decisionesValidacion = new Map<string, number>();
const consultasEstado = new Map<string, number>();
const mutacionesAdmin = new Map<string, number>();

const cubetasMs = [25, 50, 100, 250, 500, 1000, 2500, 5000];
const histogramaDuracion = new Map<number, number>();

for (const cubeta of cubetasMs) histogramaDuracion.set(cubeta, 0);
histogramaDuracion.set(Infinity, 0);

function incrementarCubeta(duracionMs: number) {
  for (const cubeta of cubetasMs) {
    if (duracionMs <= cubeta) {
      histogramaDuracion.set(cubeta, (histogramaDuracion.get(cubeta) ?? 0) + 1);
      return;
    }
  }
  histogramaDuracion.set(Infinity, (histogramaDuracion.get(Infinity) ?? 0) + 1);
}

function incrementar(mapa: Map<string, number>, clave: string) {
  mapa.set(clave, (mapa.get(clave) ?? 0) + 1);
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

export function registrarDecisionValidacion(decision: string) {
  incrementar(decisionesValidacion, decision);
}

export function registrarConsultaEstado(estado: string) {
  incrementar(consultasEstado, estado);
}

export function registrarMutacionAdmin(accion: string) {
  incrementar(mutacionesAdmin, accion);
}

function exportarMapa(lineas: string[], nombre: string, ayuda: string, etiqueta: string, mapa: Map<string, number>) {
  lineas.push('');
  lineas.push(`# HELP ${nombre} ${ayuda}`);
  lineas.push(`# TYPE ${nombre} counter`);
  for (const [valorEtiqueta, valor] of mapa.entries()) {
    lineas.push(`${nombre}{${etiqueta}="${valorEtiqueta}"} ${valor}`);
  }
}

export function exportarMetricasPrometheus(): string {
  const lineas: string[] = [];
  lineas.push('# HELP licencias_http_requests_total Total de requests HTTP procesados');
  lineas.push('# TYPE licencias_http_requests_total counter');
  for (const [clave, valor] of solicitudesPorRuta.entries()) {
    const [metodo, ruta, estatus] = clave.split('|');
    lineas.push(`licencias_http_requests_total{method="${metodo}",route="${ruta}",status="${estatus}"} ${valor}`);
  }
  lineas.push('');

  lineas.push('# HELP licencias_http_request_duration_ms_bucket Histograma simple de latencia por buckets');
  lineas.push('# TYPE licencias_http_request_duration_ms_bucket counter');
  for (const [cubeta, valor] of histogramaDuracion.entries()) {
    const le = cubeta === Infinity ? '+Inf' : String(cubeta);
    lineas.push(`licencias_http_request_duration_ms_bucket{le="${le}"} ${valor}`);
  }
  lineas.push('');

  lineas.push('# HELP licencias_process_uptime_seconds Uptime del proceso');
  lineas.push('# TYPE licencias_process_uptime_seconds gauge');
  lineas.push(`licencias_process_uptime_seconds ${Math.floor((Date.now() - inicioDelProceso) / 1000)}`);
  lineas.push('');

  lineas.push('# HELP licencias_http_errors_total Total de respuestas con error 5xx');
  lineas.push('# TYPE licencias_http_errors_total counter');
  lineas.push(`licencias_http_errors_total ${solicitudesTotales.errores}`);

  exportarMapa(
    lineas,
    'licencias_validaciones_total',
    'Decisiones del motor de validacion por tipo',
    'decision',
    decisionesValidacion
  );
  exportarMapa(lineas, 'licencias_consultas_estado_total', 'Consultas de estado de dispositivo', 'estado', consultasEstado);
  exportarMapa(lineas, 'licencias_mutaciones_admin_total', 'Operaciones administrativas con cambio de estado', 'accion', mutacionesAdmin);

  return lineas.join('\n');
}
