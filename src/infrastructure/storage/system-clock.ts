import { IClock } from '../../application/ports/clock.port';

export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}
