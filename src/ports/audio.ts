/**
 * Audio port interface (client side).
 * Sounds are resolved relative to the module that plays them.
 */
export interface AudioPort {
  playSound(moduleId: string, sound: string): void;
  playSoundAt(moduleId: string, sound: string, x: number, y: number): void;
}
