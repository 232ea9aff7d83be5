/**
 * configuracion
 *
 * Responsabilidad: Construir la configuracion explicita del cliente de licencias a partir del entorno.
 * Limites: No hay singleton de modulo; quien arranca la app pasa el resultado a cada componente.
 */
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

function numeroEntorno(porDefecto: number, min: number, max: number) {
  return z.preprocess(
    (valor) => (valor === undefined || valor === '' ? porDefecto : valor),
    z.coerce.number().int().min(min).max(max)
  );
}

const esquemaEntorno = z.object({
  LICENCIAS_URL_SERVIDOR: z.string().trim().url(),
  LICENCIAS_VERSION_APP: z.string().trim().min(1).max(64).default('1.0.0'),
  LICENCIAS_INTERVALO_SONDEO_MS: numeroEntorno(10_000, 1_000, 60 * 60 * 1000),
  LICENCIAS_TIMEOUT_MS: numeroEntorno(8_000, 500, 120_000),
  LICENCIAS_ESPERA_CIERRE_MS: numeroEntorno(15_000, 0, 5 * 60 * 1000),
  // 0 desactiva el periodo de gracia sin conexion.
  LICENCIAS_HORAS_SIN_CONEXION: numeroEntorno(24, 0, 24 * 30),
  LICENCIAS_DIR_RESPALDO: z.string().trim().optional()
});

export type ConfiguracionCliente = {
  urlServidor: string;
  versionApp: string;
  intervaloSondeoMs: number;
  timeoutMs: number;
  esperaCierreMs: number;
  horasSinConexion: number;
  directorioRespaldo: string;
};

export function crearConfiguracionCliente(env: NodeJS.ProcessEnv = process.env): ConfiguracionCliente {
  const resultado = esquemaEntorno.safeParse(env);
  if (!resultado.success) {
    const problemas = resultado.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Configuracion del cliente de licencias invalida (${problemas.join('; ')})`);
  }

  const datos = resultado.data;
  return {
    urlServidor: datos.LICENCIAS_URL_SERVIDOR.replace(/\/+$/, ''),
    versionApp: datos.LICENCIAS_VERSION_APP,
    intervaloSondeoMs: datos.LICENCIAS_INTERVALO_SONDEO_MS,
    timeoutMs: datos.LICENCIAS_TIMEOUT_MS,
    esperaCierreMs: datos.LICENCIAS_ESPERA_CIERRE_MS,
    horasSinConexion: datos.LICENCIAS_HORAS_SIN_CONEXION,
    directorioRespaldo: datos.LICENCIAS_DIR_RESPALDO || path.join(os.homedir(), '.cliente-licencias')
  };
}
