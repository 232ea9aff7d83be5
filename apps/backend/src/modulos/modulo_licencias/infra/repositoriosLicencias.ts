/**
 * Repositorios Mongo de licencias y activaciones.
 */
import { Activacion as ModeloActivacion, type DocActivacion } from '../modeloActivacion';
import { Licencia as ModeloLicencia, type DocLicencia } from '../modeloLicencia';
import type {
  Activacion,
  CambiosLicencia,
  Licencia,
  NuevaLicencia,
  RepositorioActivaciones,
  RepositorioLicencias,
  ResultadoVinculacion
} from '../shared/tiposLicencias';

function aLicencia(doc: DocLicencia): Licencia {
  return {
    clave: doc.clave,
    correo: doc.correo ?? null,
    nombre: doc.nombre ?? null,
    tipoLicencia: doc.tipoLicencia,
    maxMaquinas: doc.maxMaquinas,
    maquinasVinculadas: [...(doc.maquinasVinculadas ?? [])],
    funciones: [...(doc.funciones ?? [])],
    activa: doc.activa,
    creadaEn: doc.creadaEn,
    expiraEn: doc.expiraEn ?? null,
    mensajePersonalizado: doc.mensajePersonalizado ?? null,
    notas: doc.notas ?? null,
    ultimoContactoEn: doc.ultimoContactoEn ?? null,
    ultimaIp: doc.ultimaIp ?? null,
    ultimaVersion: doc.ultimaVersion ?? null
  };
}

function aActivacion(doc: DocActivacion): Activacion {
  return {
    clave: doc.clave,
    hashMaquina: doc.hashMaquina,
    idDispositivo: doc.idDispositivo ?? null,
    ip: doc.ip ?? null,
    versionCliente: doc.versionCliente ?? null,
    activadaEn: doc.activadaEn
  };
}

function esErrorClaveDuplicada(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

export class MongoRepositorioLicencias implements RepositorioLicencias {
  async buscarPorClave(clave: string): Promise<Licencia | null> {
    const doc = await ModeloLicencia.findOne({ clave }).lean<DocLicencia>();
    return doc ? aLicencia(doc) : null;
  }

  async listar(): Promise<Licencia[]> {
    const docs = await ModeloLicencia.find({}).sort({ creadaEn: -1 }).lean<DocLicencia[]>();
    return docs.map(aLicencia);
  }

  async crear(licencias: NuevaLicencia[]): Promise<Licencia[]> {
    if (licencias.length === 0) return [];
    const docs: DocLicencia[] = licencias.map((licencia) => ({ ...licencia, maquinasVinculadas: [] }));
    await ModeloLicencia.insertMany(docs, { ordered: true });
    return docs.map(aLicencia);
  }

  async actualizar(clave: string, cambios: CambiosLicencia): Promise<Licencia | null> {
    const doc = await ModeloLicencia.findOneAndUpdate({ clave }, { $set: cambios }, { new: true, runValidators: true }).lean<DocLicencia>();
    return doc ? aLicencia(doc) : null;
  }

  async alternarActiva(clave: string): Promise<boolean | null> {
    // Pipeline de actualizacion: la inversion ocurre en el servidor, sin leer-y-escribir.
    const doc = await ModeloLicencia.findOneAndUpdate({ clave }, [{ $set: { activa: { $not: '$activa' } } }], {
      new: true
    }).lean<DocLicencia>();
    return doc ? doc.activa : null;
  }

  async eliminar(clave: string): Promise<boolean> {
    const resultado = await ModeloLicencia.deleteOne({ clave });
    return resultado.deletedCount > 0;
  }

  async vincularMaquina(clave: string, hashMaquina: string): Promise<ResultadoVinculacion> {
    const actualizada = await ModeloLicencia.findOneAndUpdate(
      {
        clave,
        maquinasVinculadas: { $ne: hashMaquina },
        $expr: { $lt: [{ $size: '$maquinasVinculadas' }, '$maxMaquinas'] }
      },
      { $push: { maquinasVinculadas: hashMaquina } },
      { new: true }
    ).lean<DocLicencia>();
    if (actualizada) return 'vinculada';

    const actual = await ModeloLicencia.findOne({ clave }).select('maquinasVinculadas').lean<Pick<DocLicencia, 'maquinasVinculadas'>>();
    if (!actual) return 'licencia_inexistente';
    return actual.maquinasVinculadas.includes(hashMaquina) ? 'ya_vinculada' : 'sin_cupo';
  }

  async desvincularMaquina(clave: string, hashMaquina: string): Promise<boolean> {
    const resultado = await ModeloLicencia.updateOne(
      { clave, maquinasVinculadas: hashMaquina },
      { $pull: { maquinasVinculadas: hashMaquina } }
    );
    return resultado.modifiedCount > 0;
  }

  async limpiarMaquinas(clave: string): Promise<boolean> {
    const resultado = await ModeloLicencia.updateOne({ clave }, { $set: { maquinasVinculadas: [] } });
    return resultado.matchedCount > 0;
  }

  async registrarContacto(clave: string, datos: { en: Date; ip: string | null; version: string | null }): Promise<void> {
    await ModeloLicencia.updateOne(
      { clave },
      { $set: { ultimoContactoEn: datos.en, ultimaIp: datos.ip, ultimaVersion: datos.version } }
    );
  }

  async desactivarExpiradas(ahora: Date): Promise<number> {
    const resultado = await ModeloLicencia.updateMany(
      { activa: true, expiraEn: { $ne: null, $lt: ahora } },
      { $set: { activa: false } }
    );
    return resultado.modifiedCount;
  }
}

export class MongoRepositorioActivaciones implements RepositorioActivaciones {
  async registrar(activacion: Activacion): Promise<void> {
    try {
      await ModeloActivacion.create(activacion);
    } catch (error) {
      if (esErrorClaveDuplicada(error)) return;
      throw error;
    }
  }

  async listar(): Promise<Activacion[]> {
    const docs = await ModeloActivacion.find({}).sort({ activadaEn: -1 }).lean<DocActivacion[]>();
    return docs.map(aActivacion);
  }

  async eliminar(clave: string, hashMaquina: string): Promise<boolean> {
    const resultado = await ModeloActivacion.deleteOne({ clave, hashMaquina });
    return resultado.deletedCount > 0;
  }

  async eliminarPorClave(clave: string): Promise<number> {
    const resultado = await ModeloActivacion.deleteMany({ clave });
    return resultado.deletedCount;
  }
}
