// src/core/missions/registry.ts
// Ordered, namespaced mission list

import { InvalidArgumentError, MissingRequiredFieldError } from "../errors";

export interface Mission {
  module: string;
  /** Canonical key, `module:name` unless the name was already namespaced */
  name: string;
  handler: string;
  description: string;
  saveKey: string;
}

const REQUIRED_FIELDS = ["name", "handler", "description", "save_key"] as const;

type RequiredField = (typeof REQUIRED_FIELDS)[number];

function readField(def: object, field: RequiredField): string {
  const value: unknown = Reflect.get(def, field);
  if (value === undefined || value === null) throw new MissingRequiredFieldError(field, "mission");
  if (typeof value !== "string") {
    throw new InvalidArgumentError(`Mission field '${field}' must be a string`);
  }
  return value;
}

export function missionKey(moduleId: string, name: string): string {
  return name.includes(":") ? name : `${moduleId}:${name}`;
}

export class MissionRegistry {
  private readonly ordered: Mission[] = [];
  private readonly index = new Map<string, Mission>();

  /**
   * Register a mission declared by `moduleId`. Declaring the same key again
   * replaces the earlier mission in place.
   */
  add(moduleId: string, def: unknown): Mission {
    if (typeof def !== "object" || def === null) {
      throw new InvalidArgumentError("Mission definition must be a table");
    }
    const [name, handler, description, saveKey] = REQUIRED_FIELDS.map((field) => readField(def, field));
    const mission: Mission = {
      module: moduleId,
      name: missionKey(moduleId, name),
      handler,
      description,
      saveKey,
    };

    const existing = this.index.get(mission.name);
    if (existing) {
      this.ordered[this.ordered.indexOf(existing)] = mission;
    } else {
      this.ordered.push(mission);
    }
    this.index.set(mission.name, mission);
    return mission;
  }

  get(key: string): Mission | undefined {
    return this.index.get(key);
  }

  list(): readonly Mission[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }
}
