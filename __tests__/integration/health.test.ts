import request from 'supertest';
import { createApp } from '../../src/app';

// Probes never reach the upstream, so it can point anywhere.
const app = createApp({
  upstreamUrl: 'http://127.0.0.1:9',
  serviceName: 'sticky-gateway',
  serviceVersion: '2.3.4',
});

describe('Sticky gateway health check', () => {
  it('should return 200 status', async () => {
    const response = await request(app).get('/health');
    expect(response.status).toBe(200);
  });

  it('should return health status object', async () => {
    const response = await request(app).get('/health');

    expect(response.body).toHaveProperty('status', 'ok');
    expect(response.body).toHaveProperty('service', 'sticky-gateway');
    expect(response.body).toHaveProperty('timestamp');
    expect(response.body).toHaveProperty('uptime');
    expect(response.body).toHaveProperty('version', '2.3.4');
  });

  it('should return valid timestamp', async () => {
    const response = await request(app).get('/health');
    const timestamp = new Date(response.body.timestamp);
    expect(timestamp.getTime()).toBeGreaterThan(0);
  });

  it('should return uptime as a number', async () => {
    const response = await request(app).get('/health');
    expect(typeof response.body.uptime).toBe('number');
    expect(response.body.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should not add the backend header to probes', async () => {
    const response = await request(app).get('/health');
    expect(response.headers['access-control-expose-headers']).toBeUndefined();
    expect(response.headers['x-traefik-backend']).toBeUndefined();
  });

  it('should echo a generated request id', async () => {
    const response = await request(app).get('/health');
    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should replace an unusable request id', async () => {
    const response = await request(app).get('/health').set('x-request-id', 'has spaces in it');
    expect(response.headers['x-request-id']).not.toBe('has spaces in it');
  });

  it('should expose Prometheus metrics including affinity resolutions', async () => {
    const response = await request(app).get('/metrics');
    expect(response.status).toBe(200);
    expect(response.text).toContain('# TYPE sticky_affinity_resolutions_total counter');
  });
});
