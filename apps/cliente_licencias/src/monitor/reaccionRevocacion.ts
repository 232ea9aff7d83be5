/**
 * reaccionRevocacion
 *
 * Responsabilidad: Mostrar el aviso de revocacion y cerrar la aplicacion.
 * Limites: El cierre ocurre al confirmar el aviso o al vencer la espera, lo que pase primero,
 * aunque el presentador falle.
 */
import { log, logError } from '../infraestructura/logging/logger';
import type { MonitorLicencia } from './monitorLicencia';
import type { AvisoRevocacion } from './tiposMonitor';

export const CODIGO_SALIDA_REVOCACION = 3;

export type PresentadorRevocacion = (aviso: AvisoRevocacion) => Promise<void> | void;

export type OpcionesReaccion = {
  presentar: PresentadorRevocacion;
  terminar: (codigoSalida: number) => void;
  esperaMs: number;
};

export async function reaccionarRevocacion(aviso: AvisoRevocacion, opciones: OpcionesReaccion): Promise<void> {
  let temporizador: NodeJS.Timeout | undefined;
  const limite = new Promise<'tiempo_agotado'>((resolve) => {
    temporizador = setTimeout(() => resolve('tiempo_agotado'), opciones.esperaMs);
  });
  const confirmacion = Promise.resolve()
    .then(() => opciones.presentar(aviso))
    .then(
      () => 'confirmado' as const,
      (error: unknown) => {
        logError('Fallo al mostrar el aviso de revocacion', error, { tipo: aviso.tipo });
        return 'fallo_presentador' as const;
      }
    );

  try {
    const desenlace = await Promise.race([confirmacion, limite]);
    log('warn', 'Cerrando la aplicacion por revocacion de licencia', { tipo: aviso.tipo, desenlace });
  } finally {
    clearTimeout(temporizador);
    opciones.terminar(CODIGO_SALIDA_REVOCACION);
  }
}

/** Suscribe la reaccion al evento `revocado`; devuelve la funcion para desuscribir. */
export function conectarReaccionRevocacion(monitor: Pick<MonitorLicencia, 'eventos'>, opciones: OpcionesReaccion) {
  return monitor.eventos.suscribir('revocado', (aviso) => {
    void reaccionarRevocacion(aviso, opciones);
  });
}
