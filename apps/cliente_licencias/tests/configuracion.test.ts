/**
 * configuracion.test
 *
 * Configuracion explicita del cliente construida desde el entorno.
 */
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { crearConfiguracionCliente } from '../src/configuracion';

describe('crearConfiguracionCliente', () => {
  it('aplica valores por defecto y quita la barra final de la URL', () => {
    expect(crearConfiguracionCliente({ LICENCIAS_URL_SERVIDOR: 'http://localhost:4000/' })).toEqual({
      urlServidor: 'http://localhost:4000',
      versionApp: '1.0.0',
      intervaloSondeoMs: 10_000,
      timeoutMs: 8_000,
      esperaCierreMs: 15_000,
      horasSinConexion: 24,
      directorioRespaldo: path.join(os.homedir(), '.cliente-licencias')
    });
  });

  it('lee valores numericos del entorno y trata los vacios como ausentes', () => {
    const configuracion = crearConfiguracionCliente({
      LICENCIAS_URL_SERVIDOR: 'https://licencias.example.com',
      LICENCIAS_VERSION_APP: '3.1.4',
      LICENCIAS_INTERVALO_SONDEO_MS: '5000',
      LICENCIAS_TIMEOUT_MS: '',
      LICENCIAS_ESPERA_CIERRE_MS: '0',
      LICENCIAS_HORAS_SIN_CONEXION: '0',
      LICENCIAS_DIR_RESPALDO: '/var/lib/app-licencias'
    });
    expect(configuracion).toEqual({
      urlServidor: 'https://licencias.example.com',
      versionApp: '3.1.4',
      intervaloSondeoMs: 5_000,
      timeoutMs: 8_000,
      esperaCierreMs: 0,
      horasSinConexion: 0,
      directorioRespaldo: '/var/lib/app-licencias'
    });
  });

  it('exige la URL del servidor', () => {
    expect(() => crearConfiguracionCliente({})).toThrow(/LICENCIAS_URL_SERVIDOR/);
  });

  it('rechaza un intervalo de sondeo fuera de rango', () => {
    expect(() =>
      crearConfiguracionCliente({ LICENCIAS_URL_SERVIDOR: 'http://localhost:4000', LICENCIAS_INTERVALO_SONDEO_MS: '10' })
    ).toThrow(/LICENCIAS_INTERVALO_SONDEO_MS/);
  });

  it('limita el periodo de gracia sin conexion a 30 dias', () => {
    expect(() =>
      crearConfiguracionCliente({ LICENCIAS_URL_SERVIDOR: 'http://localhost:4000', LICENCIAS_HORAS_SIN_CONEXION: '721' })
    ).toThrow(/LICENCIAS_HORAS_SIN_CONEXION/);
  });

  it('devuelve objetos independientes en cada llamada', () => {
    const env = { LICENCIAS_URL_SERVIDOR: 'http://localhost:4000' };
    expect(crearConfiguracionCliente(env)).not.toBe(crearConfiguracionCliente(env));
  });
});
