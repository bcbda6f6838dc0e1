import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configuration } from '../src/config/configuration';

describe('Departments API (e2e)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    const config = configuration({ DEPARTMENT_STORAGE: 'memory', KAFKA_ENABLED: 'false', NODE_ENV: 'test' });
    const moduleRef = await Test.createTestingModule({
      imports: [AppModule.forRoot(config)],
    }).compile();

    app = moduleRef.createNestApplication({ logger: false });
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  async function create(name: string, description?: string) {
    return request(app.getHttpServer()).post('/api/v1/departments').send({ name, description });
  }

  it('creates a department', async () => {
    const res = await create('Finance', 'Money matters');

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ id: 1, name: 'Finance', description: 'Money matters' });
  });

  it('lists departments ordered by name', async () => {
    await create('Marketing');
    await create('Finance');

    const res = await request(app.getHttpServer()).get('/api/v1/departments');

    expect(res.status).toBe(200);
    expect(res.body).toEqual([
      { id: 2, name: 'Finance', description: '' },
      { id: 1, name: 'Marketing', description: '' },
    ]);
  });

  it('rejects a duplicate name with 409', async () => {
    await create('Finance');

    const res = await create('finance');

    expect(res.status).toBe(409);
    expect(res.body.message).toBe("A department with name 'finance' already exists.");
  });

  it('rejects a blank name with 400', async () => {
    const res = await create('   ');

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('Department name cannot be null or empty.');
  });

  it('rejects an oversized name before it reaches the service', async () => {
    const res = await create('N'.repeat(101));

    expect(res.status).toBe(400);
    expect(res.body.message).toEqual(['Department name must be between 1 and 100 characters']);
  });

  it('rejects unknown body properties', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/v1/departments')
      .send({ name: 'Finance', budget: 10 });

    expect(res.status).toBe(400);
  });

  it('fetches a department by id and by name', async () => {
    await create('Human Resources');

    const byId = await request(app.getHttpServer()).get('/api/v1/departments/1');
    const byName = await request(app.getHttpServer()).get('/api/v1/departments/by-name/human%20resources');

    expect(byId.status).toBe(200);
    expect(byId.body).toEqual({ id: 1, name: 'Human Resources', description: '' });
    expect(byName.status).toBe(200);
    expect(byName.body.id).toBe(1);
  });

  it('answers 404 for an unknown id and 400 for a malformed one', async () => {
    const missing = await request(app.getHttpServer()).get('/api/v1/departments/7');
    const negative = await request(app.getHttpServer()).get('/api/v1/departments/-1');
    const text = await request(app.getHttpServer()).get('/api/v1/departments/abc');

    expect(missing.status).toBe(404);
    expect(negative.status).toBe(400);
    expect(text.status).toBe(400);
  });

  it('searches departments by keyword', async () => {
    await create('Human Resources');
    await create('Human Capital');
    await create('Finance');

    const res = await request(app.getHttpServer()).get('/api/v1/departments/search').query({ keyword: 'Human' });

    expect(res.status).toBe(200);
    expect(res.body.map((record: { name: string }) => record.name)).toEqual(['Human Capital', 'Human Resources']);
  });

  it('accepts a search keyword longer than any name', async () => {
    await create('Finance');

    const res = await request(app.getHttpServer())
      .get('/api/v1/departments/search')
      .query({ keyword: 'F'.repeat(101) });

    expect(res.status).toBe(200);
    expect(res.body).toEqual([]);
  });

  it('requires a search keyword', async () => {
    const res = await request(app.getHttpServer()).get('/api/v1/departments/search');

    expect(res.status).toBe(400);
  });

  it('updates a department', async () => {
    await create('Finance');

    const res = await request(app.getHttpServer())
      .put('/api/v1/departments/1')
      .send({ name: 'Treasury', description: 'Cash' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: 1, name: 'Treasury', description: 'Cash' });
  });

  it('maps update failures to 404 and 409', async () => {
    await create('Finance');
    await create('Marketing');

    const missing = await request(app.getHttpServer()).put('/api/v1/departments/9').send({ name: 'Legal' });
    const taken = await request(app.getHttpServer()).put('/api/v1/departments/1').send({ name: 'MARKETING' });

    expect(missing.status).toBe(404);
    expect(taken.status).toBe(409);
  });

  it('deletes a department', async () => {
    await create('Finance');

    const res = await request(app.getHttpServer()).delete('/api/v1/departments/1');
    const after = await request(app.getHttpServer()).get('/api/v1/departments/1');
    const again = await request(app.getHttpServer()).delete('/api/v1/departments/1');

    expect(res.status).toBe(204);
    expect(after.status).toBe(404);
    expect(again.status).toBe(404);
  });

  it('reports health', async () => {
    const res = await request(app.getHttpServer()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: 'healthy',
      service: 'department-service',
      dependencies: { storage: 'memory', kafka: 'disabled' },
    });
  });
});
