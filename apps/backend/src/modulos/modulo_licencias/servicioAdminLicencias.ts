/**
 * servicioAdminLicencias
 *
 * Responsabilidad: Operaciones del panel de administracion sobre licencias y activaciones.
 * Limites: Cada mutacion escribe un registro de actividad; una clave inexistente es 404.
 */
import { ErrorAplicacion, errorLicenciaNoEncontrada } from '../../compartido/errores/errorAplicacion';
import type { Reloj } from '../../compartido/tipos/reloj';
import { registrarMutacionAdmin } from '../../compartido/observabilidad/metrics';
import { claveCorta, log } from '../../infraestructura/logging/logger';
import type { ServicioAuditoria } from '../modulo_auditoria/servicioAuditoria';
import type { ServicioEstadoDispositivos } from '../modulo_dispositivos/servicioEstadoDispositivos';
import { calcularExpiracion, estaExpirada, generarClaveLicencia, normalizarClave } from './domain/politicaValidacion';
import type {
  Activacion,
  CambiosLicencia,
  Licencia,
  NuevaLicencia,
  RepositorioActivaciones,
  RepositorioLicencias,
  TipoLicencia
} from './shared/tiposLicencias';

export type DatosNuevaLicencia = {
  correo?: string | null;
  nombre?: string | null;
  tipoLicencia: TipoLicencia;
  maxMaquinas: number;
  duracionDias?: number | null;
  funciones: string[];
  notas?: string | null;
  mensajePersonalizado?: string | null;
};

export type DatosLote = Pick<DatosNuevaLicencia, 'tipoLicencia' | 'maxMaquinas' | 'duracionDias' | 'funciones'> & {
  cantidad: number;
};

export type Estadisticas = {
  totalLicencias: number;
  licenciasActivas: number;
  licenciasExpiradas: number;
  totalActivaciones: number;
  actividadUltimas24h: number;
  tiposLicencia: Record<string, number>;
  dispositivosPorEstado: Record<string, number>;
};

export type ServicioAdminLicencias = ReturnType<typeof crearServicioAdminLicencias>;

export function crearServicioAdminLicencias(deps: {
  licencias: RepositorioLicencias;
  activaciones: RepositorioActivaciones;
  estadoDispositivos: ServicioEstadoDispositivos;
  auditoria: ServicioAuditoria;
  reloj: Reloj;
  maxLicenciasLote: number;
}) {
  const { licencias, activaciones, estadoDispositivos, auditoria, reloj, maxLicenciasLote } = deps;

  function construir(datos: DatosNuevaLicencia, ahora: Date): NuevaLicencia {
    return {
      clave: generarClaveLicencia(),
      correo: datos.correo ?? null,
      nombre: datos.nombre ?? null,
      tipoLicencia: datos.tipoLicencia,
      maxMaquinas: datos.maxMaquinas,
      funciones: [...datos.funciones],
      activa: true,
      creadaEn: ahora,
      expiraEn: calcularExpiracion(ahora, datos.duracionDias),
      mensajePersonalizado: datos.mensajePersonalizado ?? null,
      notas: datos.notas ?? null
    };
  }

  async function exigirLicencia(clave: string): Promise<Licencia> {
    const licencia = await licencias.buscarPorClave(clave);
    if (!licencia) throw errorLicenciaNoEncontrada(clave);
    return licencia;
  }

  async function crear(datos: DatosNuevaLicencia): Promise<Licencia> {
    const [licencia] = await licencias.crear([construir(datos, reloj.now())]);
    if (!licencia) throw new ErrorAplicacion('LICENCIA_NO_CREADA', 'No se pudo crear la licencia', 500);
    await auditoria.registrar({
      accion: 'license_created',
      claveLicencia: licencia.clave,
      detalles: { tipoLicencia: licencia.tipoLicencia, maxMaquinas: licencia.maxMaquinas }
    });
    registrarMutacionAdmin('license_created');
    log('info', 'Licencia creada', { licencia: claveCorta(licencia.clave), tipo: licencia.tipoLicencia });
    return licencia;
  }

  async function generarLote(datos: DatosLote): Promise<Licencia[]> {
    if (datos.cantidad > maxLicenciasLote) {
      throw new ErrorAplicacion('LOTE_EXCEDIDO', `Maximo ${maxLicenciasLote} licencias por lote`, 400, {
        maximo: maxLicenciasLote
      });
    }
    const ahora = reloj.now();
    const nuevas = Array.from({ length: datos.cantidad }, () => construir(datos, ahora));
    const creadas = await licencias.crear(nuevas);
    await auditoria.registrar({
      accion: 'bulk_generate',
      detalles: { cantidad: creadas.length, tipoLicencia: datos.tipoLicencia, maxMaquinas: datos.maxMaquinas }
    });
    registrarMutacionAdmin('bulk_generate');
    return creadas;
  }

  function listar(): Promise<Licencia[]> {
    return licencias.listar();
  }

  async function actualizar(claveEntrada: string, cambios: CambiosLicencia): Promise<Licencia> {
    const clave = normalizarClave(claveEntrada);
    const actualizada = await licencias.actualizar(clave, cambios);
    if (!actualizada) throw errorLicenciaNoEncontrada(clave);
    await auditoria.registrar({
      accion: 'license_updated',
      claveLicencia: clave,
      detalles: { campos: Object.keys(cambios).sort() }
    });
    registrarMutacionAdmin('license_updated');
    return actualizada;
  }

  async function alternarActiva(claveEntrada: string): Promise<boolean> {
    const clave = normalizarClave(claveEntrada);
    const activa = await licencias.alternarActiva(clave);
    if (activa === null) throw errorLicenciaNoEncontrada(clave);
    await auditoria.registrar({ accion: 'license_toggled', claveLicencia: clave, detalles: { activa } });
    registrarMutacionAdmin('license_toggled');
    return activa;
  }

  /** Libera todos los lugares; los registros de dispositivo no se tocan. */
  async function reiniciar(claveEntrada: string): Promise<{ activacionesEliminadas: number }> {
    const clave = normalizarClave(claveEntrada);
    await exigirLicencia(clave);
    // Primero los hashes: un bind en curso que escriba su fila despues ya no encuentra su lugar.
    await licencias.limpiarMaquinas(clave);
    const activacionesEliminadas = await activaciones.eliminarPorClave(clave);
    await auditoria.registrar({ accion: 'license_reset', claveLicencia: clave, detalles: { activacionesEliminadas } });
    registrarMutacionAdmin('license_reset');
    return { activacionesEliminadas };
  }

  async function eliminar(claveEntrada: string): Promise<{ activacionesEliminadas: number }> {
    const clave = normalizarClave(claveEntrada);
    const eliminada = await licencias.eliminar(clave);
    if (!eliminada) throw errorLicenciaNoEncontrada(clave);
    const activacionesEliminadas = await activaciones.eliminarPorClave(clave);
    await auditoria.registrar({ accion: 'license_deleted', claveLicencia: clave, detalles: { activacionesEliminadas } });
    registrarMutacionAdmin('license_deleted');
    return { activacionesEliminadas };
  }

  function listarActivaciones(): Promise<Activacion[]> {
    return activaciones.listar();
  }

  async function desactivarExpiradas(): Promise<number> {
    const cantidad = await licencias.desactivarExpiradas(reloj.now());
    await auditoria.registrar({ accion: 'bulk_disable_expired', detalles: { cantidad } });
    registrarMutacionAdmin('bulk_disable_expired');
    return cantidad;
  }

  async function estadisticas(): Promise<Estadisticas> {
    const ahora = reloj.now();
    const [todas, todasActivaciones, actividadUltimas24h, dispositivosPorEstado] = await Promise.all([
      licencias.listar(),
      activaciones.listar(),
      auditoria.contarUltimas24Horas(),
      estadoDispositivos.contarPorEstado()
    ]);
    const tiposLicencia: Record<string, number> = {};
    let licenciasActivas = 0;
    let licenciasExpiradas = 0;
    for (const licencia of todas) {
      tiposLicencia[licencia.tipoLicencia] = (tiposLicencia[licencia.tipoLicencia] ?? 0) + 1;
      const expirada = estaExpirada(licencia, ahora);
      if (expirada) licenciasExpiradas += 1;
      else if (licencia.activa) licenciasActivas += 1;
    }
    return {
      totalLicencias: todas.length,
      licenciasActivas,
      licenciasExpiradas,
      totalActivaciones: todasActivaciones.length,
      actividadUltimas24h,
      tiposLicencia,
      dispositivosPorEstado
    };
  }

  return {
    crear,
    generarLote,
    listar,
    actualizar,
    alternarActiva,
    reiniciar,
    eliminar,
    listarActivaciones,
    desactivarExpiradas,
    estadisticas,
    logs: auditoria.listar
  };
}
