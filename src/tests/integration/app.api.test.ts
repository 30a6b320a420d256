import request from 'supertest';
import app from '@/app';

jest.mock('@/config/dependencies', () => {
  const { InMemoryAccountRepository } = jest.requireActual<
    typeof import('@/tests/utils/inMemoryAccountRepository')
  >('@/tests/utils/inMemoryAccountRepository');
  const { AccountService } = jest.requireActual<typeof import('@/services/account.service')>(
    '@/services/account.service'
  );

  const accountRepository = new InMemoryAccountRepository();
  return {
    accountRepository,
    accountService: new AccountService(accountRepository),
  };
});

describe('Service API', () => {
  describe('GET /', () => {
    it('should return the service banner', async () => {
      const response = await request(app).get('/').expect(200);

      expect(response.body.name).toBe('Account REST API Service');
      expect(response.body.paths).toBe('/accounts');
    });
  });

  describe('GET /health', () => {
    it('should be healthy', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body).toEqual({ status: 'OK' });
    });
  });

  describe('response headers', () => {
    it('should add security headers to requests that arrived over HTTPS', async () => {
      const response = await request(app).get('/').set('X-Forwarded-Proto', 'https').expect(200);

      expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
      expect(response.headers['x-content-type-options']).toBe('nosniff');
      expect(response.headers['content-security-policy']).toBe(
        "default-src 'self';object-src 'none'"
      );
      expect(response.headers['referrer-policy']).toBe('strict-origin-when-cross-origin');
    });

    it("should keep helmet's remaining defaults over HTTPS", async () => {
      const response = await request(app).get('/').set('X-Forwarded-Proto', 'https').expect(200);

      expect(response.headers['strict-transport-security']).toBe(
        'max-age=15552000; includeSubDomains'
      );
      expect(response.headers['cross-origin-opener-policy']).toBe('same-origin');
    });

    it('should keep security headers on error responses over HTTPS', async () => {
      const response = await request(app)
        .get('/accounts/0')
        .set('X-Forwarded-Proto', 'https')
        .expect(404);

      expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    });

    it('should not add security headers over plain HTTP', async () => {
      const response = await request(app).get('/').expect(200);

      expect(response.headers['x-frame-options']).toBeUndefined();
      expect(response.headers['content-security-policy']).toBeUndefined();
      expect(response.headers['strict-transport-security']).toBeUndefined();
    });

    it('should allow any origin over HTTPS', async () => {
      const response = await request(app).get('/').set('X-Forwarded-Proto', 'https').expect(200);

      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('should allow any origin over plain HTTP', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.headers['access-control-allow-origin']).toBe('*');
    });
  });

  describe('GET /api-docs', () => {
    it('should serve the API documentation', async () => {
      const response = await request(app).get('/api-docs/').expect(200);

      expect(response.headers['content-type']).toMatch(/text\/html/);
    });
  });

  describe('request body limit', () => {
    it('should return 413 for a JSON body over 10kb', async () => {
      const response = await request(app)
        .post('/accounts')
        .send({ name: 'x'.repeat(11 * 1024), email: 'big@example.com' })
        .expect(413);

      expect(response.body).toEqual({
        success: false,
        error: { message: 'request entity too large' },
      });
    });
  });

  describe('unknown routes', () => {
    it('should return 404 with the route in the message', async () => {
      const response = await request(app).get('/nonexistent').expect(404);

      expect(response.body).toEqual({
        success: false,
        error: { message: 'Route GET /nonexistent not found' },
      });
    });
  });
});
