import { Injectable } from '@nestjs/common';
import { describeError } from '../common';
import { AdbCommandService } from '../device/services';
import { StopDetectorService } from '../detection/services';

@Injectable()
export class HealthService {
  constructor(
    private adb: AdbCommandService,
    private stopDetector: StopDetectorService,
  ) {}

  async check() {
    const [adbCheck] = await Promise.allSettled([this.checkAdb()]);

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      detection: this.stopDetector.resolveConfig(),
      services: {
        adb: {
          status: adbCheck.status === 'fulfilled' ? 'up' : 'down',
          details:
            adbCheck.status === 'fulfilled'
              ? adbCheck.value
              : { error: describeError(adbCheck.reason) },
        },
      },
    };
  }

  live() {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }

  private async checkAdb() {
    const result = await this.adb.run(['version']);
    if (!result.ok) {
      throw new Error(result.stderr);
    }

    return { message: 'ADB is available', version: result.stdout.split('\n')[0] };
  }
}
