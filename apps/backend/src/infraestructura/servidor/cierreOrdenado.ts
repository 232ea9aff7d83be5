/**
 * cierreOrdenado
 *
 * Responsabilidad: Detener el API ante SIGTERM/SIGINT: deja de aceptar conexiones y luego
 * desconecta MongoDB.
 * Limites:
 * - Senales repetidas reutilizan el mismo cierre en curso.
 * - Un fallo se registra y termina con codigo 1.
 */
import { log, logError } from '../logging/logger';

export type ServidorCerrable = {
  close(callback: (error?: Error) => void): unknown;
};

export function crearCierreOrdenado(deps: {
  servidor: ServidorCerrable;
  cerrarBaseDatos: () => Promise<void>;
  salir: (codigo: number) => void;
}) {
  const { servidor, cerrarBaseDatos, salir } = deps;
  let enCurso: Promise<void> | null = null;

  return function cerrar(senal: string): Promise<void> {
    if (enCurso) return enCurso;
    log('info', 'Cerrando el API de licencias', { senal });
    enCurso = new Promise<void>((resolve, reject) => {
      servidor.close((error) => (error ? reject(error) : resolve()));
    })
      .then(() => cerrarBaseDatos())
      .then(
        () => {
          log('ok', 'API de licencias detenida', { senal });
          salir(0);
        },
        (error: unknown) => {
          logError('Fallo el cierre ordenado del API', error, { senal });
          salir(1);
        }
      );
    return enCurso;
  };
}
