/**
 * ValidationErrors — Ordered, path-addressed tree of violations.
 *
 * Every node holds its own violations (constraints on the node as a whole)
 * plus child trees keyed by property name and by item index. Property
 * children keep insertion order; item children are always reported in
 * index order. Empty children are never stored, so an empty tree means
 * the value passed.
 */

import type {
  FlatError,
  PathSegment,
  SerializedErrors,
  Violation,
} from './types.js';
import type { RenderOptions } from '../messages/types.js';
import { renderViolation } from '../messages/MessageRenderer.js';

/**
 * JSON.stringify replacer that keeps NaN and the infinities apart
 * instead of collapsing them to null.
 */
function keepNonFinite(_key: string, value: unknown): unknown {
  return typeof value === 'number' && !Number.isFinite(value) ? String(value) : value;
}

/**
 * Escape one JSON Pointer segment (RFC 6901).
 */
export function escapePointerSegment(segment: PathSegment): string {
  return String(segment).replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Build a JSON Pointer from path segments. The root is "".
 */
export function toJsonPointer(path: readonly PathSegment[]): string {
  return path.map((segment) => `/${escapePointerSegment(segment)}`).join('');
}

/**
 * Order-insensitive structural form used by `equals`.
 */
interface CanonicalErrors {
  violations: string[];
  properties: Array<[string, CanonicalErrors]>;
  items: Array<[number, CanonicalErrors]>;
}

export class ValidationErrors {
  private readonly ownViolations: Violation[] = [];
  private readonly propertyErrors = new Map<string, ValidationErrors>();
  private readonly itemErrors = new Map<number, ValidationErrors>();

  /**
   * Create a tree holding the given violations at its root.
   */
  static of(...violations: Violation[]): ValidationErrors {
    const errors = new ValidationErrors();
    for (const violation of violations) {
      errors.push(violation);
    }
    return errors;
  }

  /**
   * Violations on this node itself.
   */
  get violations(): readonly Violation[] {
    return this.ownViolations;
  }

  /**
   * Child trees by property name, in insertion order.
   */
  get properties(): ReadonlyMap<string, ValidationErrors> {
    return this.propertyErrors;
  }

  /**
   * Child trees by item index, in index order.
   */
  get items(): ReadonlyMap<number, ValidationErrors> {
    return new Map([...this.itemErrors].sort(([a], [b]) => a - b));
  }

  /**
   * Add a violation to this node.
   */
  push(violation: Violation): this {
    this.ownViolations.push(violation);
    return this;
  }

  /**
   * Merge a child tree under a property name (string) or item index
   * (number). Merging an empty tree is a no-op.
   */
  mergeAt(segment: PathSegment, child: ValidationErrors): this {
    if (child.isEmpty()) {
      return this;
    }

    if (typeof segment === 'number') {
      const existing = this.itemErrors.get(segment);
      if (existing === undefined) {
        this.itemErrors.set(segment, child.clone());
      } else {
        existing.merge(child);
      }
    } else {
      const existing = this.propertyErrors.get(segment);
      if (existing === undefined) {
        this.propertyErrors.set(segment, child.clone());
      } else {
        existing.merge(child);
      }
    }

    return this;
  }

  /**
   * Path-wise union: violations of `other` are appended at the same
   * paths in this tree. Returns this tree.
   */
  merge(other: ValidationErrors): this {
    if (other === this) {
      return this.merge(other.clone());
    }
    for (const violation of [...other.ownViolations]) {
      this.ownViolations.push(violation);
    }
    for (const [name, child] of [...other.propertyErrors]) {
      this.mergeAt(name, child);
    }
    for (const [index, child] of [...other.itemErrors]) {
      this.mergeAt(index, child);
    }
    return this;
  }

  /**
   * Deep copy of the tree structure. Violations are immutable and shared.
   */
  clone(): ValidationErrors {
    return new ValidationErrors().merge(this);
  }

  /**
   * True when there is no violation anywhere in the tree.
   */
  isEmpty(): boolean {
    if (this.ownViolations.length > 0) return false;
    for (const child of this.propertyErrors.values()) {
      if (!child.isEmpty()) return false;
    }
    for (const child of this.itemErrors.values()) {
      if (!child.isEmpty()) return false;
    }
    return true;
  }

  /**
   * Total number of violations in the tree.
   */
  count(): number {
    let total = this.ownViolations.length;
    for (const child of this.propertyErrors.values()) total += child.count();
    for (const child of this.itemErrors.values()) total += child.count();
    return total;
  }

  /**
   * Subtree at a path, or undefined when nothing failed there.
   */
  at(path: readonly PathSegment[]): ValidationErrors | undefined {
    let node: ValidationErrors | undefined = this;
    for (const segment of path) {
      if (node === undefined) return undefined;
      node = typeof segment === 'number'
        ? node.itemErrors.get(segment)
        : node.propertyErrors.get(segment);
    }
    return node;
  }

  /**
   * Visit every node that has its own violations, depth first: a node
   * before its children, properties before items.
   */
  walk(visitor: (path: readonly PathSegment[], violations: readonly Violation[]) => void): void {
    this.walkFrom([], visitor);
  }

  private walkFrom(
    path: PathSegment[],
    visitor: (path: readonly PathSegment[], violations: readonly Violation[]) => void
  ): void {
    if (this.ownViolations.length > 0) {
      visitor(path, this.ownViolations);
    }
    for (const [name, child] of this.propertyErrors) {
      child.walkFrom([...path, name], visitor);
    }
    for (const [index, child] of this.items) {
      child.walkFrom([...path, index], visitor);
    }
  }

  /**
   * Structural equality, ignoring the order of violations within a node
   * and of children within a parent.
   */
  equals(other: ValidationErrors): boolean {
    return JSON.stringify(this.canonical()) === JSON.stringify(other.canonical());
  }

  private canonical(): CanonicalErrors {
    return {
      violations: this.ownViolations.map((v) => JSON.stringify(v, keepNonFinite)).sort(),
      properties: [...this.propertyErrors]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([name, child]) => [name, child.canonical()]),
      items: [...this.itemErrors]
        .sort(([a], [b]) => a - b)
        .map(([index, child]) => [index, child.canonical()]),
    };
  }

  /**
   * Render every violation, grouped by JSON Pointer path.
   */
  render(options: RenderOptions = {}): Record<string, string[]> {
    const rendered: Record<string, string[]> = {};
    this.walk((path, violations) => {
      rendered[toJsonPointer(path)] = violations.map((v) => renderViolation(v, options));
    });
    return rendered;
  }

  /**
   * Render as a flat list of path/message pairs, in tree order.
   */
  toFlat(options: RenderOptions = {}): FlatError[] {
    const flat: FlatError[] = [];
    this.walk((path, violations) => {
      const pointer = toJsonPointer(path);
      for (const violation of violations) {
        flat.push({ path: pointer, message: renderViolation(violation, options) });
      }
    });
    return flat;
  }

  /**
   * Nested serializable form with rendered messages.
   */
  serialize(options: RenderOptions = {}): SerializedErrors {
    const serialized: SerializedErrors = {
      errors: this.ownViolations.map((v) => renderViolation(v, options)),
    };

    if (this.propertyErrors.size > 0) {
      const properties: Record<string, SerializedErrors> = {};
      for (const [name, child] of this.propertyErrors) {
        properties[name] = child.serialize(options);
      }
      serialized.properties = properties;
    }

    if (this.itemErrors.size > 0) {
      const items: Record<string, SerializedErrors> = {};
      for (const [index, child] of this.items) {
        items[String(index)] = child.serialize(options);
      }
      serialized.items = items;
    }

    return serialized;
  }

  toJSON(): SerializedErrors {
    return this.serialize();
  }
}
