/**
 * Controlador de estado de dispositivos: sondeo publico y acciones del panel admin.
 */
import type { Request, Response } from 'express';
import { parsearConsulta, parsearParametros } from '../../compartido/validaciones/validar';
import type { ServicioEstadoDispositivos } from './servicioEstadoDispositivos';
import { respuestaDispositivo } from './respuestasDispositivos';
import {
  esquemaFiltroDispositivos,
  esquemaParametrosDispositivo,
  type EntradaBanear,
  type EntradaCambiarEstado,
  type EntradaConsultarEstado
} from './validacionesDispositivos';

export function crearControladorDispositivos(servicio: ServicioEstadoDispositivos) {
  const idDispositivo = (req: Request) => parsearParametros(esquemaParametrosDispositivo, req.params).id;

  async function consultarEstado(req: Request, res: Response) {
    const datos: EntradaConsultarEstado = req.body;
    const { estado, razon } = await servicio.consultarEstado(datos.device_id);
    res.json({ status: estado, reason: razon });
  }

  async function listarDispositivos(req: Request, res: Response) {
    const { status } = parsearConsulta(esquemaFiltroDispositivos, req.query);
    const dispositivos = await servicio.listar(status);
    res.json({ devices: dispositivos.map(respuestaDispositivo), total: dispositivos.length });
  }

  async function banearDispositivo(req: Request, res: Response) {
    const datos: EntradaBanear = req.body ?? {};
    const dispositivo = await servicio.banear(idDispositivo(req), datos.reason ?? null);
    res.json({ device: respuestaDispositivo(dispositivo) });
  }

  async function desbanearDispositivo(req: Request, res: Response) {
    const dispositivo = await servicio.desbanear(idDispositivo(req));
    res.json({ device: respuestaDispositivo(dispositivo) });
  }

  async function cambiarEstadoDispositivo(req: Request, res: Response) {
    const datos: EntradaCambiarEstado = req.body;
    const dispositivo = await servicio.cambiarEstado(idDispositivo(req), datos.status, datos.reason ?? null);
    res.json({ device: respuestaDispositivo(dispositivo) });
  }

  return { consultarEstado, listarDispositivos, banearDispositivo, desbanearDispositivo, cambiarEstadoDispositivo };
}
