import { Test } from '@nestjs/testing';
import { StopDetectorService } from '../detection/services';
import { AdbCommandService } from '../device/services';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let service: HealthService;
  const run = jest.fn();

  beforeEach(async () => {
    run.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [
        HealthService,
        StopDetectorService,
        { provide: AdbCommandService, useValue: { run } },
      ],
    }).compile();

    service = moduleRef.get(HealthService);
  });

  it('reports adb as up with the first line of `adb version`', async () => {
    run.mockResolvedValue({
      ok: true,
      stdout: 'Android Debug Bridge version 1.0.41\nVersion 35.0.1',
      stderr: '',
    });

    const health = await service.check();

    expect(run).toHaveBeenCalledWith(['version']);
    expect(health.status).toBe('ok');
    expect(health.services.adb).toEqual({
      status: 'up',
      details: { message: 'ADB is available', version: 'Android Debug Bridge version 1.0.41' },
    });
  });

  it('reports adb as down with the failure message', async () => {
    run.mockResolvedValue({ ok: false, stdout: '', stderr: 'Error: ADB not found.' });

    const health = await service.check();

    expect(health.status).toBe('ok');
    expect(health.services.adb).toEqual({
      status: 'down',
      details: { error: 'Error: ADB not found.' },
    });
  });

  it('includes the effective detection thresholds', async () => {
    run.mockResolvedValue({ ok: true, stdout: 'Android Debug Bridge', stderr: '' });

    const health = await service.check();

    expect(health.detection).toEqual({
      stopRadiusMeters: 50,
      minStopDurationMinutes: 1,
      maxTimeGapMinutes: 30,
    });
  });
});
