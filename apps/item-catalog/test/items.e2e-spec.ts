import { INestApplication, Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { Model } from 'nestjs-dynamoose';
import request from 'supertest';
import { configureApp } from '../src/app.setup';
import { MIGRATIONS_DIRECTORY } from '../src/database/database.constants';
import { MigrationExecutor } from '../src/database/migrations/migration.executor';
import { MigrationLoader } from '../src/database/migrations/migration.loader';
import { Item, ItemKey } from '../src/modules/items/interfaces/item.interface';
import { ItemsController } from '../src/modules/items/items.controller';
import { ItemsRepository } from '../src/modules/items/items.repository';
import { ItemsService } from '../src/modules/items/items.service';
import {
  createInMemoryModel,
  InMemoryMigrationRecorder,
  InMemoryTableAdmin,
} from './utils/in-memory-dynamo';

describe('Items API Tests', () => {
  let app: INestApplication;
  let admin: InMemoryTableAdmin;
  let executor: MigrationExecutor;

  beforeEach(async () => {
    // Keep the test output clean
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    admin = new InMemoryTableAdmin();
    executor = new MigrationExecutor(
      new MigrationLoader(MIGRATIONS_DIRECTORY),
      new InMemoryMigrationRecorder(admin),
      admin,
    );

    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [ItemsController],
      providers: [
        ItemsService,
        {
          provide: ItemsRepository,
          useFactory: () =>
            new ItemsRepository(
              createInMemoryModel(admin, 'items') as unknown as Model<
                Item,
                ItemKey
              >,
            ),
        },
      ],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  describe('before migrations', () => {
    it('should fail the first access with no such table', async () => {
      const response = await request(app.getHttpServer())
        .post('/items')
        .send({ name: 'Apple' })
        .expect(503);

      expect(response.body).toEqual({
        type: 'NoSuchTableError',
        message: 'no such table: items',
        hint: 'Apply pending migrations with `catalog migrate`',
      });
    });
  });

  describe('after migrations', () => {
    beforeEach(async () => {
      await expect(executor.migrate()).resolves.toEqual(['0001_initial']);
    });

    it('should create an item and fetch it back by name', async () => {
      const created = await request(app.getHttpServer())
        .post('/items')
        .send({ name: 'Apple' })
        .expect(201);

      expect(created.body).toEqual({
        id: expect.any(String),
        name: 'Apple',
        createdAt: expect.any(String),
      });

      const fetched = await request(app.getHttpServer())
        .get('/items')
        .query({ name: 'Apple' })
        .expect(200);

      expect(fetched.body).toEqual(created.body);
    });

    it('should fetch an item by ID', async () => {
      const created = await request(app.getHttpServer())
        .post('/items')
        .send({ name: 'Pear' })
        .expect(201);

      const fetched = await request(app.getHttpServer())
        .get(`/items/${created.body.id}`)
        .expect(200);

      expect(fetched.body).toEqual(created.body);
    });

    it('should return 404 for an unknown name', async () => {
      const response = await request(app.getHttpServer())
        .get('/items')
        .query({ name: 'Plum' })
        .expect(404);

      expect(response.body).toEqual({
        type: 'NotFoundException',
        message: 'Item with name "Plum" does not exist',
      });
    });

    it('should return 404 for an unknown ID', async () => {
      const id = '6f1c7a52-3b7e-4a7c-9d55-0c2b1e5b8a01';

      const response = await request(app.getHttpServer())
        .get(`/items/${id}`)
        .expect(404);

      expect(response.body.message).toBe(`Item with ID "${id}" does not exist`);
    });

    it('should return 409 when several items share the name', async () => {
      for (let i = 0; i < 2; i++) {
        await request(app.getHttpServer())
          .post('/items')
          .send({ name: 'Apple' })
          .expect(201);
      }

      const response = await request(app.getHttpServer())
        .get('/items')
        .query({ name: 'Apple' })
        .expect(409);

      expect(response.body).toEqual({
        type: 'ConflictException',
        message: '2 items are named "Apple", expected exactly one',
      });
    });

    it('should return 400 for a malformed ID', async () => {
      const response = await request(app.getHttpServer())
        .get('/items/not-a-uuid')
        .expect(400);

      expect(response.body).toEqual({
        type: 'BadRequestException',
        message: 'Validation failed (uuid is expected)',
      });
    });

    it.each([
      [{ name: '' }, 'name should not be empty'],
      [
        { name: 'x'.repeat(101) },
        'name must be shorter than or equal to 100 characters',
      ],
      [{ name: 'Apple', price: 3 }, 'property price should not exist'],
      [{}, 'name must be a string'],
    ])('should return 422 for %j', async (body, error) => {
      const response = await request(app.getHttpServer())
        .post('/items')
        .send(body)
        .expect(422);

      expect(response.body.type).toBe('ValidationError');
      expect(response.body.message).toBe('Validation failed');
      expect(response.body.errors).toContain(error);
      expect(admin.rows('items')).toEqual([]);
    });

    it('should accept a name of exactly 100 characters', async () => {
      const name = 'x'.repeat(100);

      const response = await request(app.getHttpServer())
        .post('/items')
        .send({ name })
        .expect(201);

      expect(response.body.name).toBe(name);
    });
  });
});
