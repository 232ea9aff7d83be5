/**
 * Punto de entrada del API de licencias.
 * Inicializa configuracion, base de datos e indices, y el servidor HTTP; SIGTERM/SIGINT lo cierran
 * en orden.
 */
import { crearApp } from './app';
import { configuracion } from './configuracion';
import { asegurarIndices, cerrarBaseDatos, conectarBaseDatos } from './infraestructura/baseDatos/mongoose';
import { logError, log } from './infraestructura/logging/logger';
import { crearCierreOrdenado } from './infraestructura/servidor/cierreOrdenado';
import { RegistroActividad } from './modulos/modulo_auditoria/modeloRegistroActividad';
import { Dispositivo } from './modulos/modulo_dispositivos/modeloDispositivo';
import { Activacion } from './modulos/modulo_licencias/modeloActivacion';
import { Licencia } from './modulos/modulo_licencias/modeloLicencia';

async function iniciar() {
  const conectado = await conectarBaseDatos(configuracion.mongoUri);
  if (conectado) {
    await asegurarIndices([Licencia, Activacion, Dispositivo, RegistroActividad]);
  }
  if (!configuracion.adminApiKey) {
    log('warn', 'ADMIN_API_KEY no esta definido; el panel admin rechazara todas las llamadas');
  }

  const app = crearApp();
  const servidor = app.listen(configuracion.puerto, () => {
    log('ok', 'API de licencias escuchando', { puerto: configuracion.puerto });
  });

  const cerrar = crearCierreOrdenado({ servidor, cerrarBaseDatos, salir: (codigo) => process.exit(codigo) });
  for (const senal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(senal, () => {
      void cerrar(senal);
    });
  }
}

iniciar().catch((error) => {
  logError('Error al iniciar el servidor', error);
  process.exit(1);
});
