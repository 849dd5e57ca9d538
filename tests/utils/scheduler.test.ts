import nodeCron from 'node-cron';

import { scheduleAnnouncements } from '../../src/utils/scheduler';

jest.mock('node-cron', () => ({
  __esModule: true,
  default: {
    validate: jest.fn((expression: string) => expression.split(' ').length === 5),
    schedule: jest.fn()
  }
}));

const mockedCron = jest.mocked(nodeCron);

describe('scheduleAnnouncements', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  test('registers the task in the given timezone', () => {
    scheduleAnnouncements(jest.fn().mockResolvedValue(undefined), '0 8 * * *', 'Europe/Oslo');

    expect(mockedCron.schedule).toHaveBeenCalledWith('0 8 * * *', expect.any(Function), {
      timezone: 'Europe/Oslo'
    });
  });

  test('rejects invalid expressions before scheduling', () => {
    expect(() => scheduleAnnouncements(jest.fn(), 'every morning', 'Europe/Oslo')).toThrow(
      'Invalid cron expression: every morning'
    );
    expect(mockedCron.schedule).not.toHaveBeenCalled();
  });

  test('logs a failing run instead of rejecting the tick', async () => {
    const task = jest.fn().mockRejectedValue(new Error('Metrix nede'));
    scheduleAnnouncements(task, '0 8 * * *', 'Europe/Oslo');

    const tick = mockedCron.schedule.mock.calls[0][1];
    if (typeof tick !== 'function') {
      throw new Error('expected a callback');
    }
    await expect(Promise.resolve(tick(new Date()))).resolves.toBeUndefined();
    expect(task).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
