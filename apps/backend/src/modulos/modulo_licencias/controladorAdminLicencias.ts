/**
 * Controlador del panel de administracion de licencias.
 *
 * Requiere `X-Admin-Key` (ver `requerirAdmin`); aqui se asume ya autenticado.
 */
import type { Request, Response } from 'express';
import type { Reloj } from '../../compartido/tipos/reloj';
import { parsearConsulta, parsearParametros } from '../../compartido/validaciones/validar';
import { z } from 'zod';
import { LIMITE_LOGS_MAXIMO, LIMITE_LOGS_POR_DEFECTO } from '../modulo_auditoria/servicioAuditoria';
import type { ServicioAdminLicencias } from './servicioAdminLicencias';
import type { CambiosLicencia } from './shared/tiposLicencias';
import { respuestaActivacion, respuestaLicencia, respuestaRegistro } from './respuestasLicencias';
import {
  esquemaParametrosLicencia,
  type EntradaActualizarLicencia,
  type EntradaCrearLicencia,
  type EntradaGenerarLote
} from './validacionesLicencias';

const esquemaConsultaLogs = z.object({
  limit: z.coerce.number().int().min(1).max(LIMITE_LOGS_MAXIMO).default(LIMITE_LOGS_POR_DEFECTO)
});

function aCambios(datos: EntradaActualizarLicencia): CambiosLicencia {
  const cambios: CambiosLicencia = {};
  if (datos.email !== undefined) cambios.correo = datos.email;
  if (datos.name !== undefined) cambios.nombre = datos.name;
  if (datos.license_type !== undefined) cambios.tipoLicencia = datos.license_type;
  if (datos.max_machines !== undefined) cambios.maxMaquinas = datos.max_machines;
  if (datos.features !== undefined) cambios.funciones = datos.features;
  if (datos.active !== undefined) cambios.activa = datos.active;
  if (datos.notes !== undefined) cambios.notas = datos.notes;
  if (datos.custom_message !== undefined) cambios.mensajePersonalizado = datos.custom_message;
  if (datos.expires_at !== undefined) cambios.expiraEn = datos.expires_at;
  return cambios;
}

export function crearControladorAdminLicencias(servicio: ServicioAdminLicencias, reloj: Reloj) {
  const clave = (req: Request) => parsearParametros(esquemaParametrosLicencia, req.params).key;

  async function listarLicencias(_req: Request, res: Response) {
    const ahora = reloj.now();
    const licencias = await servicio.listar();
    res.json({ licenses: licencias.map((licencia) => respuestaLicencia(licencia, ahora)), total: licencias.length });
  }

  async function crearLicencia(req: Request, res: Response) {
    const datos: EntradaCrearLicencia = req.body;
    const licencia = await servicio.crear({
      correo: datos.email ?? null,
      nombre: datos.name ?? null,
      tipoLicencia: datos.license_type,
      maxMaquinas: datos.max_machines,
      duracionDias: datos.duration_days ?? null,
      funciones: datos.features,
      notas: datos.notes ?? null,
      mensajePersonalizado: datos.custom_message ?? null
    });
    res.status(201).json({ license_key: licencia.clave, license: respuestaLicencia(licencia, reloj.now()) });
  }

  async function actualizarLicencia(req: Request, res: Response) {
    const datos: EntradaActualizarLicencia = req.body;
    const licencia = await servicio.actualizar(clave(req), aCambios(datos));
    res.json({ license: respuestaLicencia(licencia, reloj.now()) });
  }

  async function eliminarLicencia(req: Request, res: Response) {
    const { activacionesEliminadas } = await servicio.eliminar(clave(req));
    res.json({ success: true, activations_removed: activacionesEliminadas });
  }

  async function alternarLicencia(req: Request, res: Response) {
    const claveLicencia = clave(req);
    const activa = await servicio.alternarActiva(claveLicencia);
    res.json({ license_key: claveLicencia, active: activa });
  }

  async function reiniciarLicencia(req: Request, res: Response) {
    const { activacionesEliminadas } = await servicio.reiniciar(clave(req));
    res.json({ success: true, activations_removed: activacionesEliminadas });
  }

  async function listarActivaciones(_req: Request, res: Response) {
    const activaciones = await servicio.listarActivaciones();
    res.json({ activations: activaciones.map(respuestaActivacion), total: activaciones.length });
  }

  async function generarLote(req: Request, res: Response) {
    const datos: EntradaGenerarLote = req.body;
    const licencias = await servicio.generarLote({
      cantidad: datos.count,
      tipoLicencia: datos.license_type,
      maxMaquinas: datos.max_machines,
      duracionDias: datos.duration_days ?? null,
      funciones: datos.features
    });
    res.status(201).json({ keys: licencias.map((licencia) => licencia.clave), count: licencias.length });
  }

  async function desactivarExpiradas(_req: Request, res: Response) {
    const cantidad = await servicio.desactivarExpiradas();
    res.json({ disabled: cantidad });
  }

  async function obtenerEstadisticas(_req: Request, res: Response) {
    const estadisticas = await servicio.estadisticas();
    res.json({
      total_licenses: estadisticas.totalLicencias,
      active_licenses: estadisticas.licenciasActivas,
      expired_licenses: estadisticas.licenciasExpiradas,
      total_activations: estadisticas.totalActivaciones,
      recent_activity_24h: estadisticas.actividadUltimas24h,
      license_types: estadisticas.tiposLicencia,
      devices_by_status: estadisticas.dispositivosPorEstado
    });
  }

  async function listarLogs(req: Request, res: Response) {
    const { limit } = parsearConsulta(esquemaConsultaLogs, req.query);
    const registros = await servicio.logs(limit);
    res.json({ logs: registros.map(respuestaRegistro) });
  }

  return {
    listarLicencias,
    crearLicencia,
    actualizarLicencia,
    eliminarLicencia,
    alternarLicencia,
    reiniciarLicencia,
    listarActivaciones,
    generarLote,
    desactivarExpiradas,
    obtenerEstadisticas,
    listarLogs
  };
}
