/**
 * salud.test
 *
 * Endpoints de salud y metricas (sin MongoDB conectado).
 */
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { crearApp } from '../src/app';
import { crearEntornoMemoria } from './utils/repositoriosMemoria';

describe('salud', () => {
  it('responde con estado ok y metadata de DB', async () => {
    const app = crearApp(crearEntornoMemoria());
    const respuesta = await request(app).get('/api/salud').expect(200);

    expect(respuesta.body.estado).toBe('ok');
    expect(respuesta.body.db).toEqual({ estado: 0, descripcion: 'desconectado' });
  });

  it('expone liveness y readiness degradada sin base de datos', async () => {
    const app = crearApp(crearEntornoMemoria());
    const live = await request(app).get('/api/salud/live').expect(200);
    expect(live.body).toEqual(expect.objectContaining({ estado: 'ok', servicio: 'api-licencias', env: 'test' }));

    const ready = await request(app).get('/api/salud/ready').expect(503);
    expect(ready.body.estado).toBe('degradado');
    expect(ready.body.dependencias).toEqual({ db: { estado: 0, descripcion: 'desconectado', lista: false } });
  });

  it('expone métricas en formato texto en ambas rutas', async () => {
    const app = crearApp(crearEntornoMemoria());
    await request(app).post('/api/validate').send({ license_key: 'NOPE', machine_fingerprint: 'equipo-a' }).expect(200);
    await request(app).post('/api/status').send({ device_id: 'equipo-a' }).expect(200);

    const res = await request(app).get('/api/salud/metrics').expect(200);
    expect(res.headers['content-type']).toContain('text/plain');
    const lineas = String(res.text).split('\n');
    expect(lineas).toContain('# TYPE licencias_http_requests_total counter');
    expect(lineas).toContain('licencias_db_ready_state 0');
    expect(lineas.some((linea) => linea.startsWith('licencias_validaciones_total{decision="not_found"} '))).toBe(true);
    expect(lineas.some((linea) => linea.startsWith('licencias_consultas_estado_total{estado="visitor"} '))).toBe(true);

    const alias = await request(app).get('/api/metrics').expect(200);
    expect(String(alias.text)).toContain('# TYPE licencias_mutaciones_admin_total counter');
  });

  it('propaga o genera x-request-id', async () => {
    const app = crearApp(crearEntornoMemoria());
    const propio = await request(app).get('/api/salud/live').set('x-request-id', 'req-123').expect(200);
    expect(propio.headers['x-request-id']).toBe('req-123');
    const generado = await request(app).get('/api/salud/live').expect(200);
    expect(generado.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});
