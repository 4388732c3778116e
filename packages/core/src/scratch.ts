import type { ScratchAccess, ScratchMutation } from "@helpdesk/types";
import { CancellationError } from "./errors.js";

/** Separator between namespace segments of a scratch key. */
export const SCRATCH_SEPARATOR = "/";

/**
 * Key pattern match: a trailing `*` matches any suffix, otherwise the key
 * must be equal.
 */
export function matchesKeyPattern(key: string, pattern: string): boolean {
  if (pattern.endsWith("*")) {
    return key.startsWith(pattern.slice(0, -1));
  }
  return key === pattern;
}

export function matchesAnyPattern(key: string, patterns: ReadonlyArray<string>): boolean {
  return patterns.some((p) => matchesKeyPattern(key, p));
}

/**
 * A view of the session scratch map bound to one node.
 *
 * Sequential children share their parent's namespace. Each Parallel child
 * gets a partition `<parallel>/<child>/`: its writes land there, its reads
 * fall back to the enclosing scope, and keys under `<parallel>/` (its
 * siblings' partitions) are hidden from it.
 *
 * Every write is appended to the turn journal. Once the turn ends the
 * scopes are sealed: writes from work that outlived it (a tool that ignored
 * its abort signal) throw instead of landing in the session.
 */
export class ScratchScope implements ScratchAccess {
  private constructor(
    private readonly store: Map<string, unknown>,
    readonly namespace: string,
    readonly node: string,
    private readonly journal: ScratchMutation[],
    private readonly state: { sealed: boolean },
    private readonly parent?: ScratchScope,
    private readonly hiddenPrefix?: string
  ) {}

  static root(store: Map<string, unknown>, journal: ScratchMutation[] = [], node = "session"): ScratchScope {
    return new ScratchScope(store, "", node, journal, { sealed: false });
  }

  /** Same namespace, writes attributed to `node`. */
  forNode(node: string): ScratchScope {
    return new ScratchScope(
      this.store,
      this.namespace,
      node,
      this.journal,
      this.state,
      this.parent,
      this.hiddenPrefix
    );
  }

  /** Partition for one child of the Parallel node `parallel`. */
  partition(parallel: string, child: string): ScratchScope {
    return new ScratchScope(
      this.store,
      `${this.namespace}${parallel}${SCRATCH_SEPARATOR}${child}${SCRATCH_SEPARATOR}`,
      child,
      this.journal,
      this.state,
      this,
      `${parallel}${SCRATCH_SEPARATOR}`
    );
  }

  get(key: string): unknown {
    const full = this.namespace + key;
    if (this.store.has(full)) return this.store.get(full);
    if (!this.canInherit(key)) return undefined;
    return this.parent?.get(key);
  }

  has(key: string): boolean {
    if (this.store.has(this.namespace + key)) return true;
    if (!this.canInherit(key)) return false;
    return this.parent?.has(key) ?? false;
  }

  get sealed(): boolean {
    return this.state.sealed;
  }

  /** Refuse further writes through this scope and every scope derived from the same root. */
  seal(): void {
    this.state.sealed = true;
  }

  set(key: string, value: unknown): void {
    const full = this.namespace + key;
    this.assertOpen(full);
    this.store.set(full, value);
    this.journal.push({ key: full, node: this.node, op: "set" });
  }

  delete(key: string): boolean {
    const full = this.namespace + key;
    this.assertOpen(full);
    const existed = this.store.delete(full);
    if (existed) {
      this.journal.push({ key: full, node: this.node, op: "delete" });
    }
    return existed;
  }

  /** Every key visible from this scope, relative to its namespace. */
  snapshot(): Record<string, unknown> {
    const view: Record<string, unknown> = {};
    if (this.parent) {
      for (const [key, value] of Object.entries(this.parent.snapshot())) {
        if (this.canInherit(key)) view[key] = value;
      }
    }
    for (const [key, value] of this.store) {
      if (key.startsWith(this.namespace)) {
        view[key.slice(this.namespace.length)] = value;
      }
    }
    return view;
  }

  /** Visible keys restricted to `patterns`. */
  select(patterns: ReadonlyArray<string>): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(this.snapshot()).filter(([key]) => matchesAnyPattern(key, patterns))
    );
  }

  private assertOpen(key: string): void {
    if (this.state.sealed) {
      throw new CancellationError(`Scratch write to ${key} by ${this.node} after the turn ended`);
    }
  }

  private canInherit(key: string): boolean {
    return !this.hiddenPrefix || !key.startsWith(this.hiddenPrefix);
  }
}

/**
 * Apply the per-key retention policy at a turn boundary: every key written
 * during the turn that matches no `retain` pattern is removed. Keys that
 * were not touched during the turn are left alone.
 *
 * @returns the removed keys.
 */
export function applyRetention(
  store: Map<string, unknown>,
  mutations: ReadonlyArray<ScratchMutation>,
  retain: ReadonlyArray<string>
): string[] {
  const removed: string[] = [];
  const touched = new Set(mutations.map((m) => m.key));
  for (const key of touched) {
    if (!matchesAnyPattern(key, retain) && store.delete(key)) {
      removed.push(key);
    }
  }
  return removed;
}
