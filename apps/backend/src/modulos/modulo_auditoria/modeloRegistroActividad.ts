/**
 * Modelo del registro de actividad (coleccion `registrosActividad`).
 */
import { Schema, model, models, type Model } from 'mongoose';
import { ACCIONES_ACTIVIDAD, type AccionActividad } from './shared/tiposActividad';

export interface DocRegistroActividad {
  accion: AccionActividad;
  claveLicencia?: string | null;
  idDispositivo?: string | null;
  ip?: string | null;
  detalles?: Record<string, unknown>;
  registradoEn: Date;
}

const RegistroActividadSchema = new Schema<DocRegistroActividad>(
  {
    accion: { type: String, enum: ACCIONES_ACTIVIDAD, required: true },
    claveLicencia: { type: String, default: null },
    idDispositivo: { type: String, default: null },
    ip: { type: String, default: null },
    detalles: { type: Schema.Types.Mixed, default: {} },
    registradoEn: { type: Date, required: true }
  },
  { collection: 'registrosActividad', versionKey: false }
);

RegistroActividadSchema.index({ registradoEn: -1 });
RegistroActividadSchema.index({ claveLicencia: 1, registradoEn: -1 });

export const RegistroActividad: Model<DocRegistroActividad> =
  models.RegistroActividad ?? model<DocRegistroActividad>('RegistroActividad', RegistroActividadSchema);
