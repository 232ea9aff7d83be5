/**
 * Modelo de licencia (coleccion `licencias`).
 */
import { Schema, model, models, type Model } from 'mongoose';
import { TIPOS_LICENCIA } from '../../compartido/validaciones/esquemas';
import type { TipoLicencia } from './shared/tiposLicencias';

export interface DocLicencia {
  clave: string;
  correo?: string | null;
  nombre?: string | null;
  tipoLicencia: TipoLicencia;
  maxMaquinas: number;
  maquinasVinculadas: string[];
  funciones: string[];
  activa: boolean;
  creadaEn: Date;
  expiraEn?: Date | null;
  mensajePersonalizado?: string | null;
  notas?: string | null;
  ultimoContactoEn?: Date | null;
  ultimaIp?: string | null;
  ultimaVersion?: string | null;
}

const LicenciaSchema = new Schema<DocLicencia>(
  {
    clave: { type: String, required: true, unique: true, trim: true, uppercase: true },
    correo: { type: String, default: null, trim: true, lowercase: true },
    nombre: { type: String, default: null, trim: true },
    tipoLicencia: { type: String, enum: TIPOS_LICENCIA, default: 'standard' },
    maxMaquinas: { type: Number, default: 1, min: 1 },
    maquinasVinculadas: { type: [String], default: [] },
    funciones: { type: [String], default: [] },
    activa: { type: Boolean, default: true },
    creadaEn: { type: Date, required: true },
    expiraEn: { type: Date, default: null },
    mensajePersonalizado: { type: String, default: null },
    notas: { type: String, default: null },
    ultimoContactoEn: { type: Date, default: null },
    ultimaIp: { type: String, default: null },
    ultimaVersion: { type: String, default: null }
  },
  { collection: 'licencias', versionKey: false }
);

LicenciaSchema.index({ activa: 1, expiraEn: 1 });
LicenciaSchema.index({ tipoLicencia: 1 });

export const Licencia: Model<DocLicencia> = models.Licencia ?? model<DocLicencia>('Licencia', LicenciaSchema);
