/**
 * apiLicencias.test
 *
 * Contratos HTTP del API publico y del panel admin (Supertest contra `crearApp` con repositorios
 * en memoria).
 */
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { crearApp } from '../../src/app';
import { calcularHashMaquina } from '../../src/modulos/modulo_licencias/domain/politicaValidacion';
import { crearEntornoMemoria, licenciaDePrueba, type EntornoMemoria } from '../utils/repositoriosMemoria';

const ADMIN = { 'X-Admin-Key': 'test-secret' };

let entorno: EntornoMemoria;
let app: ReturnType<typeof crearApp>;

beforeEach(async () => {
  entorno = crearEntornoMemoria({ adminApiKey: 'test-secret' });
  app = crearApp(entorno);
  await entorno.licencias.crear([
    licenciaDePrueba('ABC-123', { tipoLicencia: 'pro', maxMaquinas: 1, funciones: ['hd', 'batch'] })
  ]);
});

describe('POST /api/validate', () => {
  it('activa y responde el resumen de la licencia', async () => {
    const res = await request(app)
      .post('/api/validate')
      .send({ license_key: 'abc-123', machine_fingerprint: 'equipo-a', device_id: 'dev-a', app_version: '2.1.0' })
      .expect(200);

    expect(res.body).toEqual({
      status: 'valid',
      message: 'License activated',
      license_type: 'pro',
      features: ['hd', 'batch'],
      expires_at: null,
      max_machines: 1
    });
  });

  it('responde machine_limit al segundo equipo', async () => {
    await request(app).post('/api/validate').send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a' }).expect(200);
    const res = await request(app)
      .post('/api/validate')
      .send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-b' })
      .expect(200);
    expect(res.body).toEqual({ status: 'machine_limit', message: 'Maximum 1 device(s) allowed', max_machines: 1 });
  });

  it('responde not_found para claves desconocidas', async () => {
    const res = await request(app)
      .post('/api/validate')
      .send({ license_key: 'NOPE', machine_fingerprint: 'equipo-a' })
      .expect(200);
    expect(res.body).toEqual({ status: 'not_found', message: 'Invalid license key' });
  });

  it('responde expired con la fecha de expiracion', async () => {
    await entorno.licencias.crear([licenciaDePrueba('OLD-1', { expiraEn: new Date('2026-02-01T00:00:00.000Z') })]);
    const res = await request(app)
      .post('/api/validate')
      .send({ license_key: 'OLD-1', machine_fingerprint: 'equipo-a' })
      .expect(200);
    expect(res.body).toEqual({ status: 'expired', message: 'License has expired', expires_at: '2026-02-01T00:00:00.000Z' });
  });

  it('tolera campos extra del cliente pero exige los requeridos', async () => {
    await request(app)
      .post('/api/validate')
      .send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a', os: 'linux' })
      .expect(200);

    const res = await request(app).post('/api/validate').send({ license_key: 'ABC-123' }).expect(400);
    expect(res.body.error.codigo).toBe('VALIDACION');
    expect(res.body.error.detalles.fieldErrors.machine_fingerprint).toEqual(['Required']);
  });

  it('rechaza JSON malformado', async () => {
    const res = await request(app)
      .post('/api/validate')
      .set('Content-Type', 'application/json')
      .send('{"license_key":')
      .expect(400);
    expect(res.body).toEqual({ error: { codigo: 'JSON_INVALIDO', mensaje: 'El cuerpo no es JSON valido' } });
  });

  it('descarta operadores de MongoDB en el cuerpo', async () => {
    const res = await request(app)
      .post('/api/validate')
      .send({ license_key: { $gt: '' }, machine_fingerprint: 'equipo-a' })
      .expect(400);
    expect(res.body.error.codigo).toBe('VALIDACION');
  });
});

describe('POST /api/status y ban', () => {
  it('un ban del admin es visible en el siguiente sondeo y en validate', async () => {
    await request(app)
      .post('/api/validate')
      .send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a', device_id: 'dev-a' })
      .expect(200);
    expect((await request(app).post('/api/status').send({ device_id: 'dev-a' }).expect(200)).body).toEqual({
      status: 'active',
      reason: null
    });

    const ban = await request(app)
      .post('/admin/devices/dev-a/ban')
      .set(ADMIN)
      .send({ reason: 'suspicious activity' })
      .expect(200);
    expect(ban.body.device).toMatchObject({
      device_id: 'dev-a',
      status: 'banned',
      ban_reason: 'suspicious activity',
      banned_at: '2026-03-01T12:00:00.000Z',
      license_key: 'ABC-123'
    });

    expect((await request(app).post('/api/status').send({ device_id: 'dev-a' }).expect(200)).body).toEqual({
      status: 'banned',
      reason: 'suspicious activity'
    });
    const validar = await request(app)
      .post('/api/validate')
      .send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a', device_id: 'dev-a' })
      .expect(200);
    expect(validar.body).toEqual({ status: 'banned', message: 'This device has been banned', ban_reason: 'suspicious activity' });
  });

  it('un dispositivo desconocido es visitor', async () => {
    const res = await request(app).post('/api/status').send({ device_id: 'nunca-visto' }).expect(200);
    expect(res.body).toEqual({ status: 'visitor', reason: null });
  });
});

describe('POST /api/deactivate', () => {
  it('libera el lugar y reporta equipos desconocidos', async () => {
    await request(app).post('/api/validate').send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a' }).expect(200);
    const ok = await request(app)
      .post('/api/deactivate')
      .send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a' })
      .expect(200);
    expect(ok.body).toEqual({ success: true });

    const repetido = await request(app)
      .post('/api/deactivate')
      .send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a' })
      .expect(200);
    expect(repetido.body).toEqual({ success: false, error: 'Machine not found' });
  });
});

describe('autenticacion admin', () => {
  it('sin clave o con clave incorrecta responde 401 sin efectos', async () => {
    const sinClave = await request(app).post('/admin/licenses/ABC-123/toggle').expect(401);
    expect(sinClave.body.error.codigo).toBe('NO_AUTORIZADO');
    await request(app).post('/admin/licenses/ABC-123/toggle').set('X-Admin-Key', 'otra').expect(401);

    expect(entorno.licencias.datos.get('ABC-123')?.activa).toBe(true);
    expect(entorno.actividad.datos).toHaveLength(0);
  });

  it('sin clave configurada en el servidor rechaza todo', async () => {
    const sinClave = crearEntornoMemoria({ adminApiKey: '' });
    const appSinClave = crearApp(sinClave);
    await request(appSinClave).get('/admin/licenses').set('X-Admin-Key', '').expect(401);
    await request(appSinClave).get('/admin/licenses').set(ADMIN).expect(401);
  });
});

describe('panel admin de licencias', () => {
  it('crea, lista, actualiza y alterna una licencia', async () => {
    const creada = await request(app)
      .post('/admin/licenses')
      .set(ADMIN)
      .send({ email: 'Cliente@Example.com', license_type: 'trial', max_machines: 2, duration_days: 30, features: ['hd'] })
      .expect(201);
    const clave: string = creada.body.license_key;
    expect(clave).toMatch(/^[0-9A-F]{8}-[0-9A-F]{8}-[0-9A-F]{8}-[0-9A-F]{8}$/);
    expect(creada.body.license).toMatchObject({
      email: 'cliente@example.com',
      license_type: 'trial',
      max_machines: 2,
      machines_used: 0,
      active: true,
      expired: false,
      expires_at: '2026-03-31T12:00:00.000Z'
    });

    const lista = await request(app).get('/admin/licenses').set(ADMIN).expect(200);
    expect(lista.body.total).toBe(2);

    const actualizada = await request(app)
      .put(`/admin/licenses/${clave.toLowerCase()}`)
      .set(ADMIN)
      .send({ notes: 'renovacion anual', max_machines: 3 })
      .expect(200);
    expect(actualizada.body.license).toMatchObject({ notes: 'renovacion anual', max_machines: 3 });

    const alternada = await request(app).post(`/admin/licenses/${clave}/toggle`).set(ADMIN).expect(200);
    expect(alternada.body).toEqual({ license_key: clave, active: false });

    expect(entorno.actividad.datos.map((r) => r.accion)).toEqual(['license_created', 'license_updated', 'license_toggled']);
    expect(entorno.actividad.datos[1]?.detalles).toEqual({ campos: ['maxMaquinas', 'notas'] });
  });

  it('rechaza campos desconocidos en el panel', async () => {
    const res = await request(app).post('/admin/licenses').set(ADMIN).send({ max_machines: 1, plan: 'gold' }).expect(400);
    expect(res.body.error.codigo).toBe('VALIDACION');
  });

  it('una clave desconocida es 404 en toggle, reset, update y delete', async () => {
    const esperado = {
      error: { codigo: 'LICENCIA_NO_ENCONTRADA', mensaje: 'Licencia no encontrada', detalles: { licenseKey: 'NOPE' } }
    };
    expect((await request(app).post('/admin/licenses/nope/toggle').set(ADMIN).expect(404)).body).toEqual(esperado);
    expect((await request(app).post('/admin/licenses/NOPE/reset').set(ADMIN).expect(404)).body).toEqual(esperado);
    expect((await request(app).put('/admin/licenses/NOPE').set(ADMIN).send({ notes: 'x' }).expect(404)).body).toEqual(esperado);
    expect((await request(app).delete('/admin/licenses/NOPE').set(ADMIN).expect(404)).body).toEqual(esperado);
  });

  it('reset y delete reportan las activaciones eliminadas', async () => {
    await request(app).post('/api/validate').send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a' }).expect(200);

    const activaciones = await request(app).get('/admin/activations').set(ADMIN).expect(200);
    expect(activaciones.body.total).toBe(1);
    expect(activaciones.body.activations[0]).toMatchObject({
      license_key: 'ABC-123',
      machine_hash: calcularHashMaquina('equipo-a'),
      device_id: calcularHashMaquina('equipo-a')
    });

    const reset = await request(app).post('/admin/licenses/ABC-123/reset').set(ADMIN).expect(200);
    expect(reset.body).toEqual({ success: true, activations_removed: 1 });

    await request(app).post('/api/validate').send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-b' }).expect(200);
    const borrado = await request(app).delete('/admin/licenses/ABC-123').set(ADMIN).expect(200);
    expect(borrado.body).toEqual({ success: true, activations_removed: 1 });
    expect(entorno.activaciones.datos).toEqual([]);
  });

  it('genera lotes dentro del maximo configurado', async () => {
    const lote = await request(app)
      .post('/admin/bulk/generate')
      .set(ADMIN)
      .send({ count: 3, license_type: 'enterprise', max_machines: 5, duration_days: 365 })
      .expect(201);
    expect(lote.body.count).toBe(3);
    expect(new Set(lote.body.keys).size).toBe(3);
    expect(entorno.licencias.datos.size).toBe(4);

    const excedido = await request(app).post('/admin/bulk/generate').set(ADMIN).send({ count: 101 }).expect(400);
    expect(excedido.body.error).toEqual({
      codigo: 'LOTE_EXCEDIDO',
      mensaje: 'Maximo 100 licencias por lote',
      detalles: { maximo: 100 }
    });
  });

  it('deshabilita las expiradas y calcula estadisticas', async () => {
    await entorno.licencias.crear([
      licenciaDePrueba('OLD-1', { expiraEn: new Date('2026-02-01T00:00:00.000Z') }),
      licenciaDePrueba('OLD-2', { tipoLicencia: 'trial', expiraEn: new Date('2026-02-15T00:00:00.000Z') })
    ]);
    await request(app)
      .post('/api/validate')
      .send({ license_key: 'ABC-123', machine_fingerprint: 'equipo-a', device_id: 'dev-a' })
      .expect(200);
    await request(app).post('/admin/devices/dev-z/ban').set(ADMIN).send({}).expect(200);

    const stats = await request(app).get('/admin/stats').set(ADMIN).expect(200);
    expect(stats.body).toEqual({
      total_licenses: 3,
      active_licenses: 1,
      expired_licenses: 2,
      total_activations: 1,
      recent_activity_24h: 2,
      license_types: { pro: 1, standard: 1, trial: 1 },
      devices_by_status: { active: 1, banned: 1 }
    });

    const deshabilitadas = await request(app).post('/admin/bulk/disable-expired').set(ADMIN).expect(200);
    expect(deshabilitadas.body).toEqual({ disabled: 2 });
    expect(entorno.licencias.datos.get('OLD-1')?.activa).toBe(false);
    expect(entorno.licencias.datos.get('ABC-123')?.activa).toBe(true);
  });

  it('lista el registro de actividad con limite', async () => {
    for (const huella of ['equipo-a', 'equipo-b', 'equipo-c']) {
      await request(app).post('/api/validate').send({ license_key: 'ABC-123', machine_fingerprint: huella }).expect(200);
    }
    const logs = await request(app).get('/admin/logs?limit=2').set(ADMIN).expect(200);
    expect(logs.body.logs.map((r: { action: string }) => r.action)).toEqual(['validate_failed', 'validate_failed']);
    expect(logs.body.logs[0]).toMatchObject({
      license_key: 'ABC-123',
      device_id: calcularHashMaquina('equipo-c'),
      created_at: '2026-03-01T12:00:00.000Z'
    });

    await request(app).get('/admin/logs?limit=5000').set(ADMIN).expect(400);
  });
});

describe('panel admin de dispositivos', () => {
  it('filtra por estado y cambia estados', async () => {
    await request(app).post('/admin/devices/d1/ban').set(ADMIN).send({ reason: 'abuse' }).expect(200);
    await request(app).put('/admin/devices/d2/status').set(ADMIN).send({ status: 'suspicious' }).expect(200);

    const baneados = await request(app).get('/admin/devices?status=banned').set(ADMIN).expect(200);
    expect(baneados.body.total).toBe(1);
    expect(baneados.body.devices[0]).toMatchObject({ device_id: 'd1', status: 'banned', ban_reason: 'abuse' });

    const desbaneado = await request(app).post('/admin/devices/d1/unban').set(ADMIN).expect(200);
    expect(desbaneado.body.device).toMatchObject({ status: 'visitor', ban_reason: null, banned_at: null });

    await request(app).put('/admin/devices/d2/status').set(ADMIN).send({ status: 'deleted' }).expect(400);
    await request(app).get('/admin/devices?status=otro').set(ADMIN).expect(400);
  });
});
