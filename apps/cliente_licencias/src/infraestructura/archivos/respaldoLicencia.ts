/**
 * respaldoLicencia
 *
 * Responsabilidad: Persistir cifrada, por equipo, la ultima validacion exitosa de la licencia.
 *
 * Contrato:
 * - Un archivo por huella dentro de `directorio` (se crea si no existe).
 * - La llave se deriva de la huella: el archivo copiado a otro equipo no se puede leer.
 * - Un archivo ilegible o con otro formato se borra y se trata como ausente.
 */
import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { RegistroSinConexion } from '../../monitor/tiposMonitor';
import { log, logError } from '../logging/logger';
import { cifrarTexto, derivarLlave, descifrarTexto } from '../seguridad/cifrado';

const fechaIso = z.string().datetime().transform((valor) => new Date(valor));

const esquemaRespaldo = z.object({
  version: z.literal(1),
  validadaEn: fechaIso,
  licencia: z.object({
    clave: z.string().min(1),
    tipoLicencia: z.string(),
    funciones: z.array(z.string()),
    expiraEn: fechaIso.nullable(),
    maxMaquinas: z.number().int(),
    mensaje: z.string()
  })
});

function esArchivoInexistente(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function crearRespaldoLicenciaArchivo(opciones: { directorio: string; huella: string }) {
  const llave = derivarLlave(opciones.huella);
  const nombre = `licencia-${createHash('sha256').update(opciones.huella).digest('hex').slice(0, 16)}.enc`;
  const ruta = path.join(opciones.directorio, nombre);

  async function guardar(registro: RegistroSinConexion): Promise<void> {
    const contenido = JSON.stringify({
      version: 1,
      validadaEn: registro.validadaEn.toISOString(),
      licencia: { ...registro.licencia, expiraEn: registro.licencia.expiraEn?.toISOString() ?? null }
    });
    await fs.mkdir(opciones.directorio, { recursive: true, mode: 0o700 });
    await fs.writeFile(ruta, cifrarTexto(contenido, llave), { mode: 0o600 });
  }

  async function borrar(): Promise<void> {
    await fs.rm(ruta, { force: true });
  }

  async function leer(): Promise<RegistroSinConexion | null> {
    let cifrado: string;
    try {
      cifrado = await fs.readFile(ruta, 'utf8');
    } catch (error) {
      if (esArchivoInexistente(error)) return null;
      throw error;
    }

    let datos: unknown;
    try {
      datos = JSON.parse(descifrarTexto(cifrado, llave));
    } catch (error) {
      logError('Respaldo de licencia ilegible; se descarta', error, { ruta });
      await borrar();
      return null;
    }

    const resultado = esquemaRespaldo.safeParse(datos);
    if (!resultado.success) {
      log('warn', 'Respaldo de licencia con formato desconocido; se descarta', { ruta });
      await borrar();
      return null;
    }
    return { licencia: resultado.data.licencia, validadaEn: resultado.data.validadaEn };
  }

  return { ruta, guardar, leer, borrar };
}

export type RespaldoLicenciaArchivo = ReturnType<typeof crearRespaldoLicenciaArchivo>;
