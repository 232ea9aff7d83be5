/**
 * Endpoints de salud para monitoreo del API y de la base de datos.
 */
import { Router, type Response } from 'express';
import mongoose from 'mongoose';
import type { RespuestaLiveness, RespuestaReadiness, RespuestaSalud } from '../tipos/observabilidad';
import { exportarMetricasPrometheus } from '../observabilidad/metrics';

const TEXTO_ESTADO_DB = ['desconectado', 'conectado', 'conectando', 'desconectando'];

function estadoBaseDatos() {
  const estado = Number(mongoose.connection.readyState); // 0,1,2,3
  return { estado, descripcion: TEXTO_ESTADO_DB[estado] ?? 'desconocido' };
}

export function responderMetricas(res: Response) {
  const { estado } = estadoBaseDatos();
  const payload = `${exportarMetricasPrometheus()}\n\n# HELP licencias_db_ready_state Estado de conexión MongoDB (0-3)\n# TYPE licencias_db_ready_state gauge\nlicencias_db_ready_state ${estado}\n`;
  res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
  res.send(payload);
}

const router = Router();

router.get('/', (_req, res) => {
  const db = estadoBaseDatos();
  const payload: RespuestaSalud & { db: { estado: number; descripcion: string } } = {
    estado: 'ok',
    tiempoActivo: process.uptime(),
    db
  };
  res.json(payload);
});

router.get('/live', (_req, res) => {
  const payload: RespuestaLiveness = {
    estado: 'ok',
    tiempoActivo: process.uptime(),
    servicio: 'api-licencias',
    env: process.env.NODE_ENV ?? 'development'
  };
  res.json(payload);
});

router.get('/ready', (_req, res) => {
  const { estado, descripcion } = estadoBaseDatos();
  const lista = estado === 1;
  const payload: RespuestaReadiness = {
    estado: lista ? 'ok' : 'degradado',
    tiempoActivo: process.uptime(),
    dependencias: {
      db: { estado, descripcion, lista }
    }
  };
  res.status(lista ? 200 : 503).json(payload);
});

router.get('/metrics', (_req, res) => {
  responderMetricas(res);
});

export default router;
