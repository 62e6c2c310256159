// src/registry/variable-registry.ts

import { SYSTEM_VARIABLE_PREFIX } from '../constants/constants.js';
import { EipNameNotFoundError, EipUnresolvedTypeError } from '../errors.js';
import type { DiscoveryResult } from '../resolver/type-resolver.js';
import type { UnresolvedVariable, VariableEntry } from '../types/eip-types.js';

/**
 * Неизменяемый снимок переменных контроллера.
 * Обновление - новым discover() или через withEntry().
 */
export class VariableRegistry {
  private readonly entries: ReadonlyMap<string, VariableEntry>;
  private readonly unresolvedEntries: ReadonlyMap<string, UnresolvedVariable>;

  constructor(entries: VariableEntry[] = [], unresolved: UnresolvedVariable[] = []) {
    this.entries = new Map(entries.map(entry => [entry.name, entry]));
    this.unresolvedEntries = new Map(
      unresolved.filter(item => !this.entries.has(item.name)).map(item => [item.name, item])
    );
  }

  static fromDiscovery(result: DiscoveryResult): VariableRegistry {
    return new VariableRegistry(result.entries, result.unresolved);
  }

  /**
   * @throws EipNameNotFoundError - если переменной нет
   * @throws EipUnresolvedTypeError - если тип переменной не удалось разрешить
   */
  get(name: string): VariableEntry {
    const entry = this.entries.get(name);
    if (entry) return entry;

    const unresolved = this.unresolvedEntries.get(name);
    if (unresolved) {
      throw new EipUnresolvedTypeError(unresolved.dataType, `${name}: ${unresolved.reason}`);
    }
    throw new EipNameNotFoundError(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Instance id переменной, в том числе неразрешённой
   * @returns null, если имени нет в снимке
   */
  instanceIdOf(name: string): number | null {
    return this.entries.get(name)?.instanceId ?? this.unresolvedEntries.get(name)?.instanceId ?? null;
  }

  get size(): number {
    return this.entries.size;
  }

  get names(): string[] {
    return [...this.entries.keys()];
  }

  /** Переменные, имя которых начинается с '_' */
  get systemVariables(): VariableEntry[] {
    return [...this.entries.values()].filter(entry => isSystemVariable(entry.name));
  }

  get userVariables(): VariableEntry[] {
    return [...this.entries.values()].filter(entry => !isSystemVariable(entry.name));
  }

  get unresolved(): UnresolvedVariable[] {
    return [...this.unresolvedEntries.values()];
  }

  /**
   * Новый снимок с заменённой или добавленной записью
   */
  withEntry(entry: VariableEntry): VariableRegistry {
    const entries = [...this.entries.values()].filter(existing => existing.name !== entry.name);
    entries.push(entry);
    return new VariableRegistry(entries, this.unresolved);
  }
}

export function isSystemVariable(name: string): boolean {
  return name.startsWith(SYSTEM_VARIABLE_PREFIX);
}
