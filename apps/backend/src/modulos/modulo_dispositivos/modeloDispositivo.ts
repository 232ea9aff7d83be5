/**
 * Modelo de estado por dispositivo (coleccion `dispositivos`). Nunca se borra.
 */
import { Schema, model, models, type Model } from 'mongoose';
import { ESTADOS_DISPOSITIVO } from '../../compartido/validaciones/esquemas';
import type { EstadoDispositivo } from './shared/tiposDispositivos';

export interface DocDispositivo {
  idDispositivo: string;
  claveLicencia?: string | null;
  estado: EstadoDispositivo;
  primerContactoEn: Date;
  ultimoContactoEn: Date;
  ultimaIp?: string | null;
  visitas: number;
  intentosFallidos: number;
  razonBaneo?: string | null;
  baneadoEn?: Date | null;
}

const DispositivoSchema = new Schema<DocDispositivo>(
  {
    idDispositivo: { type: String, required: true, unique: true },
    claveLicencia: { type: String, default: null },
    estado: { type: String, enum: ESTADOS_DISPOSITIVO, default: 'visitor' },
    primerContactoEn: { type: Date, required: true },
    ultimoContactoEn: { type: Date, required: true },
    ultimaIp: { type: String, default: null },
    visitas: { type: Number, default: 0, min: 0 },
    intentosFallidos: { type: Number, default: 0, min: 0 },
    razonBaneo: { type: String, default: null },
    baneadoEn: { type: Date, default: null }
  },
  { collection: 'dispositivos', versionKey: false }
);

DispositivoSchema.index({ estado: 1, ultimoContactoEn: -1 });

export const Dispositivo: Model<DocDispositivo> =
  models.Dispositivo ?? model<DocDispositivo>('Dispositivo', DispositivoSchema);
