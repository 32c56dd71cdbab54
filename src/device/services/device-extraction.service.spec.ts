import { Test } from '@nestjs/testing';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TimelineError } from '../../common';
import { DEVICE_REPOSITORY } from '../device.constants';
import { IDeviceRepository, IPullResult } from '../interfaces';
import { DeviceExtractionService } from './device-extraction.service';
import { DevicePromptService } from './device-prompt.service';

/**
 * Dispositivo falso: cada ruta remota tiene un resultado fijo y los pulls
 * fallidos dejan un archivo parcial como haría adb
 */
class FakeDeviceRepository implements IDeviceRepository {
  devices: string[] = [];
  candidates: string[] = [];
  results = new Map<string, IPullResult>();
  pulls: string[] = [];

  async listDevices(): Promise<string[]> {
    return this.devices;
  }

  async listCandidateDatabases(): Promise<string[]> {
    return this.candidates;
  }

  async pullFile(_deviceId: string, remotePath: string, localPath: string): Promise<IPullResult> {
    this.pulls.push(remotePath);
    await fs.writeFile(localPath, 'partial');
    return this.results.get(remotePath) ?? { pulled: false, reason: 'error', detail: 'offline' };
  }
}

const expectCode = async (promise: Promise<unknown>, code: string): Promise<void> => {
  await expect(promise).rejects.toBeInstanceOf(TimelineError);
  await expect(promise).rejects.toMatchObject({ code });
};

describe('DeviceExtractionService', () => {
  let service: DeviceExtractionService;
  let repository: FakeDeviceRepository;
  const askForDevice = jest.fn<Promise<string | null>, [readonly string[]]>();

  beforeEach(async () => {
    repository = new FakeDeviceRepository();
    askForDevice.mockReset();

    const moduleRef = await Test.createTestingModule({
      providers: [
        DeviceExtractionService,
        { provide: DEVICE_REPOSITORY, useValue: repository },
        { provide: DevicePromptService, useValue: { askForDevice } },
      ],
    }).compile();

    service = moduleRef.get(DeviceExtractionService);
  });

  it('lists the devices reported by the repository', async () => {
    repository.devices = ['emulator-5554'];

    await expect(service.listConnectedDevices()).resolves.toEqual(['emulator-5554']);
  });

  describe('selectDevice', () => {
    it('fails when no device is connected', async () => {
      await expectCode(service.selectDevice([]), 'NO_DEVICE');
    });

    it('uses the requested device when it is connected', async () => {
      await expect(service.selectDevice(['A', 'B'], 'B')).resolves.toBe('B');
    });

    it('fails when the requested device is not connected', async () => {
      await expectCode(service.selectDevice(['A'], 'C'), 'DEVICE_NOT_FOUND');
    });

    it('picks the only connected device without asking', async () => {
      await expect(service.selectDevice(['A'])).resolves.toBe('A');
      expect(askForDevice).not.toHaveBeenCalled();
    });

    it('accepts a list number when several devices are connected', async () => {
      askForDevice.mockResolvedValue('2');

      await expect(service.selectDevice(['A', 'B'])).resolves.toBe('B');
      expect(askForDevice).toHaveBeenCalledWith(['A', 'B']);
    });

    it('accepts a device id when several devices are connected', async () => {
      askForDevice.mockResolvedValue('A');

      await expect(service.selectDevice(['A', 'B'])).resolves.toBe('A');
    });

    it('rejects numbers outside the list', async () => {
      askForDevice.mockResolvedValue('3');

      await expectCode(service.selectDevice(['A', 'B']), 'INVALID_SELECTION');
    });

    it('reports a cancelled prompt', async () => {
      askForDevice.mockResolvedValue(null);

      await expectCode(service.selectDevice(['A', 'B']), 'CANCELLED');
    });
  });

  describe('pullLocationDatabase', () => {
    let outputDir: string;

    beforeEach(async () => {
      outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'device-pull-'));
      repository.candidates = ['/data/gms/locations.db', '/data/gms/cache.db'];
    });

    afterEach(async () => {
      await fs.rm(outputDir, { recursive: true, force: true });
    });

    it('falls through to the next candidate and removes partial files', async () => {
      repository.results.set('/data/gms/locations.db', {
        pulled: false,
        reason: 'not_accessible',
        detail: 'Permission denied',
      });
      repository.results.set('/data/gms/cache.db', { pulled: true });

      const pulled = await service.pullLocationDatabase('A', outputDir);

      expect(pulled).toBe(path.join(outputDir, 'cache.db'));
      expect(repository.pulls).toEqual(['/data/gms/locations.db', '/data/gms/cache.db']);
      await expect(fs.readdir(outputDir)).resolves.toEqual(['cache.db']);
    });

    it('returns null when no candidate can be pulled', async () => {
      await expect(service.pullLocationDatabase('A', outputDir)).resolves.toBeNull();
      await expect(fs.readdir(outputDir)).resolves.toEqual([]);
    });
  });
});
