import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DateTime } from 'luxon';

@Injectable()
export class ClockService {
  private readonly zone: string;

  constructor(config: ConfigService) {
    this.zone = config.get<string>('timezone') ?? 'UTC';
  }

  now(): Date {
    return new Date();
  }

  /** Calendar date (YYYY-MM-DD) in the configured zone. */
  today(): string {
    const iso = DateTime.now().setZone(this.zone).toISODate();
    if (!iso) throw new Error(`Invalid APP_TIMEZONE: ${this.zone}`);
    return iso;
  }
}
