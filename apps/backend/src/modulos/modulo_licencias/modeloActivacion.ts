/**
 * Modelo de activacion (coleccion `activaciones`).
 *
 * El indice unico (clave, hashMaquina) hace idempotente la re-activacion de un mismo equipo.
 */
import { Schema, model, models, type Model } from 'mongoose';

export interface DocActivacion {
  clave: string;
  hashMaquina: string;
  idDispositivo?: string | null;
  ip?: string | null;
  versionCliente?: string | null;
  activadaEn: Date;
}

const ActivacionSchema = new Schema<DocActivacion>(
  {
    clave: { type: String, required: true },
    hashMaquina: { type: String, required: true },
    idDispositivo: { type: String, default: null },
    ip: { type: String, default: null },
    versionCliente: { type: String, default: null },
    activadaEn: { type: Date, required: true }
  },
  { collection: 'activaciones', versionKey: false }
);

ActivacionSchema.index({ clave: 1, hashMaquina: 1 }, { unique: true });
ActivacionSchema.index({ activadaEn: -1 });

export const Activacion: Model<DocActivacion> =
  models.Activacion ?? model<DocActivacion>('Activacion', ActivacionSchema);
