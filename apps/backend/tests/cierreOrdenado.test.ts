// Pruebas del cierre ordenado ante senales del sistema.
import { describe, expect, it, vi } from 'vitest';
import { crearCierreOrdenado, type ServidorCerrable } from '../src/infraestructura/servidor/cierreOrdenado';

function servidorFalso(error?: Error) {
  const orden: string[] = [];
  const servidor: ServidorCerrable = {
    close: vi.fn((callback: (error?: Error) => void) => {
      orden.push('servidor');
      callback(error);
    })
  };
  return { servidor, orden };
}

describe('crearCierreOrdenado', () => {
  it('cierra el servidor antes que la base de datos y sale con 0', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { servidor, orden } = servidorFalso();
    const cerrarBaseDatos = vi.fn(async () => {
      orden.push('base_datos');
    });
    const salir = vi.fn();

    await crearCierreOrdenado({ servidor, cerrarBaseDatos, salir })('SIGTERM');

    expect(orden).toEqual(['servidor', 'base_datos']);
    expect(salir).toHaveBeenCalledWith(0);
  });

  it('una segunda senal reutiliza el cierre en curso', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { servidor } = servidorFalso();
    const cerrarBaseDatos = vi.fn(async () => {});
    const salir = vi.fn();
    const cerrar = crearCierreOrdenado({ servidor, cerrarBaseDatos, salir });

    await Promise.all([cerrar('SIGTERM'), cerrar('SIGINT')]);

    expect(servidor.close).toHaveBeenCalledTimes(1);
    expect(cerrarBaseDatos).toHaveBeenCalledTimes(1);
    expect(salir).toHaveBeenCalledTimes(1);
  });

  it('si el servidor falla al cerrar no toca la base y sale con 1', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { servidor } = servidorFalso(new Error('Server is not running.'));
    const cerrarBaseDatos = vi.fn(async () => {});
    const salir = vi.fn();

    await crearCierreOrdenado({ servidor, cerrarBaseDatos, salir })('SIGINT');

    expect(cerrarBaseDatos).not.toHaveBeenCalled();
    expect(salir).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
