/**
 * Conexion a MongoDB con Mongoose.
 *
 * Decisiones:
 * - Si no hay URI configurada, no se conecta (permite correr pruebas y
 *   comandos sin Mongo local/externo).
 * - `strictQuery` evita queries con campos no declarados en los schemas.
 * - Los indices (unicidad de claves y de activaciones) se sincronizan al
 *   arrancar: el invariante "una activacion por (licencia, maquina)" depende
 *   del indice unico.
 */
import mongoose from 'mongoose';
import { log, logError } from '../logging/logger';

export async function conectarBaseDatos(mongoUri: string): Promise<boolean> {
  if (!mongoUri) {
    log('warn', 'MONGODB_URI no esta definido; se omite la conexion a MongoDB');
    return false;
  }

  mongoose.set('strictQuery', true);

  try {
    await mongoose.connect(mongoUri);
    log('ok', 'Conexion a MongoDB exitosa');
    return true;
  } catch (error) {
    logError('Fallo la conexion a MongoDB', error);
    throw error;
  }
}

export async function asegurarIndices(modelos: Array<{ modelName: string; syncIndexes: () => Promise<unknown> }>) {
  for (const modelo of modelos) {
    await modelo.syncIndexes();
    log('info', 'Indices sincronizados', { modelo: modelo.modelName });
  }
}

export async function cerrarBaseDatos(): Promise<void> {
  await mongoose.disconnect();
}
