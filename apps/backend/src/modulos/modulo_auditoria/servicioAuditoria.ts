/**
 * servicioAuditoria
 *
 * Responsabilidad: Punto unico de escritura del registro de actividad.
 * Limites: Una entrada por operacion con cambio de estado; las claves completas solo van a la base,
 * nunca a los logs de consola.
 */
import type { Reloj } from '../../compartido/tipos/reloj';
import type { NuevoRegistroActividad, RegistroActividad, RepositorioActividad } from './shared/tiposActividad';

export const LIMITE_LOGS_POR_DEFECTO = 100;
export const LIMITE_LOGS_MAXIMO = 1000;

export type ServicioAuditoria = ReturnType<typeof crearServicioAuditoria>;

export function crearServicioAuditoria(deps: { actividad: RepositorioActividad; reloj: Reloj }) {
  const { actividad, reloj } = deps;

  async function registrar(entrada: NuevoRegistroActividad): Promise<void> {
    await actividad.registrar({
      accion: entrada.accion,
      claveLicencia: entrada.claveLicencia ?? null,
      idDispositivo: entrada.idDispositivo ?? null,
      ip: entrada.ip ?? null,
      detalles: entrada.detalles,
      registradoEn: reloj.now()
    });
  }

  function listar(limite = LIMITE_LOGS_POR_DEFECTO): Promise<RegistroActividad[]> {
    const acotado = Math.min(Math.max(1, Math.floor(limite)), LIMITE_LOGS_MAXIMO);
    return actividad.listarRecientes(acotado);
  }

  function contarUltimas24Horas(): Promise<number> {
    return actividad.contarDesde(new Date(reloj.now().getTime() - 24 * 60 * 60 * 1000));
  }

  return { registrar, listar, contarUltimas24Horas };
}
