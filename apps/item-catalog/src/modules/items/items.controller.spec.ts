/* eslint-disable @typescript-eslint/unbound-method */
import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ItemEntity } from './entities/item.entity';
import { ItemsController } from './items.controller';
import { ItemsService } from './items.service';

describe('ItemsController', () => {
  let controller: ItemsController;
  let service: ItemsService;

  const apple = new ItemEntity({
    id: '6f1c7a52-3b7e-4a7c-9d55-0c2b1e5b8a01',
    name: 'Apple',
    createdAt: '2025-01-01T00:00:00.000Z',
  });

  // Mock the ItemsService
  const mockItemsService = {
    create: jest.fn().mockImplementation(() => Promise.resolve(apple)),
    getByName: jest.fn().mockImplementation(() => Promise.resolve(apple)),
    getById: jest.fn().mockImplementation(() => Promise.resolve(apple)),
  };

  // Mock the Logger to prevent console output during tests
  jest.spyOn(Logger.prototype, 'log').mockImplementation(() => {});

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ItemsController],
      providers: [
        {
          provide: ItemsService,
          useValue: mockItemsService,
        },
      ],
    }).compile();

    controller = module.get<ItemsController>(ItemsController);
    service = module.get<ItemsService>(ItemsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  describe('create', () => {
    it('should pass the name to the service and return its item', async () => {
      const result = await controller.create({ name: 'Apple' });

      expect(service.create).toHaveBeenCalledWith('Apple');
      expect(service.create).toHaveBeenCalledTimes(1);
      expect(result).toBe(apple);
    });
  });

  describe('findByName', () => {
    it('should look the item up by the query name', async () => {
      const result = await controller.findByName({ name: 'Apple' });

      expect(service.getByName).toHaveBeenCalledWith('Apple');
      expect(result).toBe(apple);
    });
  });

  describe('findById', () => {
    it('should look the item up by id', async () => {
      const result = await controller.findById(apple.id);

      expect(service.getById).toHaveBeenCalledWith(apple.id);
      expect(result).toBe(apple);
    });
  });
});
