import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { StopDetectorService } from '../detection/services';
import { AnalyzeFixesDto, LocationFixDto } from './dto';
import { TimelineController } from './timeline.controller';

const MINUTE = 60 * 1000;
const BASE = Date.UTC(2024, 0, 15, 8, 0, 0);

describe('TimelineController', () => {
  let controller: TimelineController;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [TimelineController],
      providers: [StopDetectorService],
    }).compile();

    controller = moduleRef.get(TimelineController);
  });

  it('returns an empty list when no fixes are supplied', () => {
    expect(controller.detectStops({ fixes: [] })).toEqual([]);
  });

  it('maps detected stops to the response shape', () => {
    const fixes = [0, 20, 45].map((minutes) => ({
      timestamp: BASE + minutes * MINUTE,
      latitude: 37.422,
      longitude: -122.0841,
    }));

    expect(controller.detectStops({ fixes })).toEqual([
      {
        arrivalTime: '2024-01-15T08:00:00.000Z',
        departureTime: '2024-01-15T08:45:00.000Z',
        durationMinutes: 45,
        latitude: 37.422,
        longitude: -122.0841,
        pointCount: 3,
        durationBand: 'medium',
      },
    ]);
  });

  it('honours threshold overrides from the body', () => {
    const fixes = [0, 20, 45].map((minutes) => ({
      timestamp: BASE + minutes * MINUTE,
      latitude: 37.422,
      longitude: -122.0841,
    }));

    const stops = controller.detectStops({ fixes, maxTimeGapMinutes: 20 });

    expect(stops).toHaveLength(1);
    expect(stops[0].departureTime).toBe('2024-01-15T08:20:00.000Z');
    expect(stops[0].durationBand).toBe('short');
  });

  describe('body validation', () => {
    const pipe = new ValidationPipe({ transform: true });
    const validate = (body: unknown): Promise<unknown> =>
      pipe.transform(body, { type: 'body', metatype: AnalyzeFixesDto });

    it('transforms a valid body into typed fixes', async () => {
      const body = await validate({
        fixes: [{ timestamp: BASE, latitude: 37.422, longitude: -122.0841 }],
        stopRadiusMeters: 75,
      });

      expect(body).toBeInstanceOf(AnalyzeFixesDto);
      expect(body).toMatchObject({ stopRadiusMeters: 75 });
      expect(body).toHaveProperty(['fixes', 0], expect.any(LocationFixDto));
    });

    it.each([
      ['a timestamp beyond the Date range', { timestamp: 1e16, latitude: 37.422, longitude: -122.0841 }],
      ['a negative timestamp', { timestamp: -1, latitude: 37.422, longitude: -122.0841 }],
      ['a latitude out of range', { timestamp: BASE, latitude: 91, longitude: -122.0841 }],
      ['a missing longitude', { timestamp: BASE, latitude: 37.422 }],
    ])('rejects %s with 400', async (_label, fix) => {
      await expect(validate({ fixes: [fix] })).rejects.toBeInstanceOf(BadRequestException);
    });

    it('rejects a negative threshold with 400', async () => {
      await expect(validate({ fixes: [], maxTimeGapMinutes: -5 })).rejects.toBeInstanceOf(
        BadRequestException,
      );
    });
  });
});
