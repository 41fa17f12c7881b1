import type { Direction } from "../core/capabilities/direction";

export interface TileInfo {
  name: string;
  hasProperty(property: string): boolean;
}

/**
 * Level port interface.
 * Read-only queries against the loaded level.
 */
export interface LevelPort {
  tileAt(x: number, y: number): TileInfo | undefined;
  wallAt(x: number, y: number, direction: Direction): string | undefined;
  roomTypeAt(x: number, y: number): string | undefined;
  roomDisplayName(roomId: number): string | undefined;
  playerRooms(player: number): number[];
}
