/**
 * Repositorio Mongo de estado de dispositivos.
 */
import { Dispositivo as ModeloDispositivo, type DocDispositivo } from '../modeloDispositivo';
import type {
  Dispositivo,
  EstadoDispositivo,
  RepositorioDispositivos,
  ResultadoCambioEstado,
  VisitaDispositivo
} from '../shared/tiposDispositivos';

function aDispositivo(doc: DocDispositivo): Dispositivo {
  return {
    idDispositivo: doc.idDispositivo,
    claveLicencia: doc.claveLicencia ?? null,
    estado: doc.estado,
    primerContactoEn: doc.primerContactoEn,
    ultimoContactoEn: doc.ultimoContactoEn,
    ultimaIp: doc.ultimaIp ?? null,
    visitas: doc.visitas ?? 0,
    intentosFallidos: doc.intentosFallidos ?? 0,
    razonBaneo: doc.razonBaneo ?? null,
    baneadoEn: doc.baneadoEn ?? null
  };
}

export class MongoRepositorioDispositivos implements RepositorioDispositivos {
  async buscar(idDispositivo: string): Promise<Dispositivo | null> {
    const doc = await ModeloDispositivo.findOne({ idDispositivo }).lean<DocDispositivo>();
    return doc ? aDispositivo(doc) : null;
  }

  async registrarVisita(idDispositivo: string, visita: VisitaDispositivo): Promise<Dispositivo> {
    const cambios: Partial<DocDispositivo> = { ultimoContactoEn: visita.en, ultimaIp: visita.ip };
    if (visita.claveLicencia) cambios.claveLicencia = visita.claveLicencia;
    const doc = await ModeloDispositivo.findOneAndUpdate(
      { idDispositivo },
      {
        $set: cambios,
        $inc: { visitas: 1 },
        $setOnInsert: { estado: 'visitor', primerContactoEn: visita.en, intentosFallidos: 0, razonBaneo: null, baneadoEn: null }
      },
      { upsert: true, new: true }
    ).lean<DocDispositivo>();
    if (!doc) throw new Error(`Upsert de dispositivo sin documento: ${idDispositivo}`);
    return aDispositivo(doc);
  }

  async registrarIntentoFallido(idDispositivo: string): Promise<number> {
    const doc = await ModeloDispositivo.findOneAndUpdate(
      { idDispositivo },
      { $inc: { intentosFallidos: 1 } },
      { new: true }
    ).lean<DocDispositivo>();
    return doc?.intentosFallidos ?? 0;
  }

  async actualizarEstadoSi(idDispositivo: string, permitidos: readonly EstadoDispositivo[], nuevo: EstadoDispositivo): Promise<boolean> {
    const resultado = await ModeloDispositivo.updateOne(
      { idDispositivo, estado: { $in: [...permitidos] } },
      { $set: { estado: nuevo } }
    );
    return resultado.modifiedCount > 0;
  }

  async fijarEstado(
    idDispositivo: string,
    cambio: { estado: EstadoDispositivo; razon: string | null; en: Date; reiniciarIntentos: boolean }
  ): Promise<ResultadoCambioEstado> {
    const baneado = cambio.estado === 'banned';
    const cambios: Partial<DocDispositivo> = {
      estado: cambio.estado,
      razonBaneo: baneado ? cambio.razon : null,
      baneadoEn: baneado ? cambio.en : null
    };
    if (cambio.reiniciarIntentos) cambios.intentosFallidos = 0;
    const alInsertar: Partial<DocDispositivo> = { primerContactoEn: cambio.en, ultimoContactoEn: cambio.en, visitas: 0 };
    if (!cambio.reiniciarIntentos) alInsertar.intentosFallidos = 0;

    const anterior = await ModeloDispositivo.findOneAndUpdate(
      { idDispositivo },
      { $set: cambios, $setOnInsert: alInsertar },
      { upsert: true, new: false }
    ).lean<DocDispositivo>();
    const actual = await ModeloDispositivo.findOne({ idDispositivo }).lean<DocDispositivo>();
    if (!actual) throw new Error(`Dispositivo no encontrado tras actualizar: ${idDispositivo}`);
    return { estadoAnterior: anterior?.estado ?? null, dispositivo: aDispositivo(actual) };
  }

  async listar(estado?: EstadoDispositivo): Promise<Dispositivo[]> {
    const filtro = estado ? { estado } : {};
    const docs = await ModeloDispositivo.find(filtro).sort({ ultimoContactoEn: -1 }).lean<DocDispositivo[]>();
    return docs.map(aDispositivo);
  }

  async contarPorEstado(): Promise<Record<string, number>> {
    const grupos = await ModeloDispositivo.aggregate<{ _id: string; total: number }>([
      { $group: { _id: '$estado', total: { $sum: 1 } } }
    ]);
    const conteo: Record<string, number> = {};
    for (const grupo of grupos) conteo[grupo._id] = grupo.total;
    return conteo;
  }
}
