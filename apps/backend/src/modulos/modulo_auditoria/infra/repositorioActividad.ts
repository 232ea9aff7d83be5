/**
 * Repositorio Mongo del registro de actividad.
 */
import { RegistroActividad as ModeloRegistro, type DocRegistroActividad } from '../modeloRegistroActividad';
import type { RegistroActividad, RepositorioActividad } from '../shared/tiposActividad';

function aRegistro(doc: DocRegistroActividad): RegistroActividad {
  return {
    accion: doc.accion,
    claveLicencia: doc.claveLicencia ?? null,
    idDispositivo: doc.idDispositivo ?? null,
    ip: doc.ip ?? null,
    detalles: doc.detalles ?? {},
    registradoEn: doc.registradoEn
  };
}

export class MongoRepositorioActividad implements RepositorioActividad {
  async registrar(registro: RegistroActividad): Promise<void> {
    await ModeloRegistro.create(registro);
  }

  async listarRecientes(limite: number): Promise<RegistroActividad[]> {
    const docs = await ModeloRegistro.find({}).sort({ registradoEn: -1 }).limit(limite).lean<DocRegistroActividad[]>();
    return docs.map(aRegistro);
  }

  async contarDesde(desde: Date): Promise<number> {
    return ModeloRegistro.countDocuments({ registradoEn: { $gte: desde } });
  }
}
