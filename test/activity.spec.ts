import { ActivityController } from '../src/modules/activity/activity.controller';
import { ActivityService } from '../src/modules/activity/activity.service';
import { listActivityQuerySchema } from '../src/modules/activity/dto/list-activity.query';
import {
  createMockDatabase,
  createTestUser,
  queueChains,
  TEST_USER_ID,
  type MockDatabase,
} from './support/query-chain';

describe('ActivityService (unit)', () => {
  let db: MockDatabase;
  let service: ActivityService;

  beforeEach(() => {
    db = createMockDatabase();
    service = new ActivityService(db as never);
  });

  it('records the action with caller ip and user agent', async () => {
    const [insert] = queueChains(db.insert, undefined);

    await service.record(
      TEST_USER_ID,
      'export_data',
      'Exported 2 credentials to CSV',
      { ip: '203.0.113.7', userAgent: 'jest-agent' },
    );

    expect(insert.values).toHaveBeenCalledWith({
      userId: TEST_USER_ID,
      action: 'export_data',
      description: 'Exported 2 credentials to CSV',
      ipAddress: '203.0.113.7',
      userAgent: 'jest-agent',
      createdAt: expect.any(Date),
    });
  });

  it('stores null ip and user agent when the context is empty', async () => {
    const [insert] = queueChains(db.insert, undefined);

    await service.record(TEST_USER_ID, 'logout', 'Signed out');

    expect(insert.values.mock.calls[0][0]).toMatchObject({
      ipAddress: null,
      userAgent: null,
    });
  });

  it('lists newest entries first with a default limit of 50', async () => {
    const createdAt = new Date('2026-03-03T10:00:00.000Z');
    const [select] = queueChains(db.select, [
      {
        id: 'a1',
        userId: TEST_USER_ID,
        action: 'login',
        description: 'Signed in',
        ipAddress: null,
        userAgent: 'jest-agent',
        createdAt,
      },
    ]);

    const entries = await service.list(TEST_USER_ID);

    expect(select.limit).toHaveBeenCalledWith(50);
    expect(entries).toEqual([
      {
        id: 'a1',
        action: 'login',
        description: 'Signed in',
        ipAddress: null,
        createdAt,
      },
    ]);
  });
});

describe('ActivityController (unit)', () => {
  it('passes the parsed limit and reports the count', async () => {
    const activityService = {
      list: jest.fn().mockResolvedValue([{ id: 'a1' }, { id: 'a2' }]),
    };
    const controller = new ActivityController(activityService as never);
    const query = listActivityQuerySchema.parse({ limit: '5' });

    const response = await controller.list(createTestUser(), query);

    expect(activityService.list).toHaveBeenCalledWith(TEST_USER_ID, 5);
    expect(response).toEqual({
      success: true,
      message: 'Activity fetched',
      data: { activities: [{ id: 'a1' }, { id: 'a2' }] },
      meta: { pagination: { total: 2 } },
    });
  });

  it('bounds the limit between 1 and 200', () => {
    expect(listActivityQuerySchema.parse({})).toEqual({ limit: 50 });
    expect(listActivityQuerySchema.safeParse({ limit: '0' }).success).toBe(
      false,
    );
    expect(listActivityQuerySchema.safeParse({ limit: '201' }).success).toBe(
      false,
    );
  });
});
