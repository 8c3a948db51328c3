import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException, ServiceUnavailableException } from '@nestjs/common';
import { MovementsController } from './movements.controller';
import { MovementsService } from './movements.service';
import { Movement, MovementKind } from '../ledger/ledger.types';

describe('MovementsController', () => {
  let controller: MovementsController;

  const mockMovementsService = {
    record: jest.fn(),
    recent: jest.fn(),
  };

  const movement: Movement = {
    productCode: 'P1',
    productName: 'Vida',
    kind: MovementKind.OUT,
    quantity: 2,
    unit: 'adet',
    note: '',
    effectiveDate: '2024-03-05',
    recordedAt: '2024-03-05 09:41',
  };

  beforeEach(async () => {
    mockMovementsService.record.mockReset();
    mockMovementsService.recent.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [MovementsController],
      providers: [
        {
          provide: MovementsService,
          useValue: mockMovementsService,
        },
      ],
    }).compile();

    controller = module.get<MovementsController>(MovementsController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('recent should default the limit to 50', async () => {
    mockMovementsService.recent.mockResolvedValue({ items: [], total: 0, malformedRows: 0 });

    await controller.recent({});

    expect(mockMovementsService.recent).toHaveBeenCalledWith(50);
  });

  it('record should return a committed outcome as is', async () => {
    const outcome = { state: 'committed', synced: true, movement, revision: '4-abc' };
    mockMovementsService.record.mockResolvedValue(outcome);
    const dto = { productCode: 'P1', kind: MovementKind.OUT, quantity: 2 };

    await expect(controller.record(dto)).resolves.toEqual(outcome);
    expect(mockMovementsService.record).toHaveBeenCalledWith(dto);
  });

  it('record should surface an unwritten movement as 503 carrying the movement', async () => {
    mockMovementsService.record.mockResolvedValue({ state: 'diverged', synced: false, movement, reason: 'unavailable' });

    const result = controller.record({ productCode: 'P1', kind: MovementKind.OUT, quantity: 2 });

    await expect(result).rejects.toThrow(ServiceUnavailableException);
    await expect(result).rejects.toMatchObject({
      response: {
        key: 'movement.persist_failed',
        details: { state: 'diverged', synced: false, movement },
      },
    });
  });

  it('record should surface a concurrent write as 409', async () => {
    mockMovementsService.record.mockResolvedValue({ state: 'diverged', synced: false, movement, reason: 'conflict' });

    await expect(
      controller.record({ productCode: 'P1', kind: MovementKind.OUT, quantity: 2 }),
    ).rejects.toThrow(ConflictException);
  });
});
