import { Injectable } from '@nestjs/common';

/** Source of "now" for generation timestamps; replaced in tests */
@Injectable()
export class ClockService {
  now(): Date {
    return new Date();
  }
}
