#!/usr/bin/env node
/**
 * index
 *
 * Responsabilidad: Punto de entrada de consola: activa la licencia de este equipo y la vigila hasta revocarla.
 * Uso: `cliente-licencias <CLAVE>` (o `LICENCIAS_CLAVE`); `--desactivar` libera el equipo y termina.
 */
import { crearConfiguracionCliente } from './configuracion';
import { calcularHuellaDispositivo } from './dispositivo/huellaDispositivo';
import { crearRespaldoLicenciaArchivo } from './infraestructura/archivos/respaldoLicencia';
import { log, logError } from './infraestructura/logging/logger';
import { crearMonitorLicencia } from './monitor/monitorLicencia';
import { conectarReaccionRevocacion } from './monitor/reaccionRevocacion';
import type { AvisoRevocacion } from './monitor/tiposMonitor';
import { crearClienteServidorLicencias } from './servicios_api/clienteServidorLicencias';

function presentarEnConsola(aviso: AvisoRevocacion) {
  process.stderr.write(`\n[${aviso.titulo}] ${aviso.mensaje}\n`);
}

async function main() {
  const argumentos = process.argv.slice(2);
  const desactivarAlIniciar = argumentos.includes('--desactivar');
  const clave = argumentos.find((arg) => !arg.startsWith('--')) ?? process.env.LICENCIAS_CLAVE ?? '';
  if (!clave.trim()) {
    log('error', 'Uso: cliente-licencias <CLAVE> [--desactivar]');
    process.exitCode = 2;
    return;
  }

  const configuracion = crearConfiguracionCliente(process.env);
  const transporte = crearClienteServidorLicencias(configuracion);
  const huella = calcularHuellaDispositivo();

  if (desactivarAlIniciar) {
    const desactivacion = await transporte.desactivar(clave.trim().toUpperCase(), huella);
    log(desactivacion.exito ? 'ok' : 'error', 'Desactivacion de este equipo', { error: desactivacion.error });
    process.exitCode = desactivacion.exito ? 0 : 1;
    return;
  }

  const monitor = crearMonitorLicencia({
    configuracion,
    transporte,
    huella,
    idDispositivo: process.env.LICENCIAS_ID_DISPOSITIVO || undefined,
    respaldo: crearRespaldoLicenciaArchivo({ directorio: configuracion.directorioRespaldo, huella })
  });
  conectarReaccionRevocacion(monitor, {
    presentar: presentarEnConsola,
    terminar: (codigo) => process.exit(codigo),
    esperaMs: configuracion.esperaCierreMs
  });

  const resultado = await monitor.iniciar(clave);
  if (!resultado.vinculado) {
    log('error', 'Licencia rechazada', { estado: resultado.decision.estado, mensaje: resultado.decision.mensaje });
    process.exitCode = 1;
    return;
  }

  log('ok', 'Licencia activa', {
    tipo: resultado.licencia.tipoLicencia,
    funciones: resultado.licencia.funciones,
    diasRestantes: monitor.diasRestantes(),
    sinConexion: resultado.sinConexion
  });

  const cerrar = () => monitor.detener();
  process.once('SIGINT', cerrar);
  process.once('SIGTERM', cerrar);
}

main().catch((error: unknown) => {
  logError('Fallo el cliente de licencias', error);
  process.exitCode = 1;
});
