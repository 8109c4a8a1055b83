import type { Byte } from '@core/cpu/types';

// Delay and sound countdowns. Aged once per 60 Hz frame by the system clock,
// never by instruction count.
export class Timers {
  delay: Byte = 0;
  sound: Byte = 0;

  reset(): void {
    this.delay = 0;
    this.sound = 0;
  }

  setDelay(value: Byte): void { this.delay = value & 0xFF; }
  setSound(value: Byte): void { this.sound = value & 0xFF; }

  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }

  // Nonzero sound timer is the only signal for the audio host to play a tone
  isSoundActive(): boolean {
    return this.sound > 0;
  }
}
