/**
 * Clock port interface.
 * Game time as the host counts it; exposed to scripts as `game_time()`.
 */
export interface ClockPort {
  nowTicks(): number;
}
