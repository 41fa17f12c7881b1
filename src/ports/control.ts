/**
 * Control port interface (server side).
 * Networked commands and player state available to mission handlers.
 */
export interface ControlPort {
  players(): number[];
  currentPlayer(): number | undefined;
  submitCommand(command: unknown): void;
  giveMoney(player: number, amount: number): void;
}
