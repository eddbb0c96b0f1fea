/**
 * Lexical scope chain for the Flo evaluator.
 *
 * Each environment holds its own bindings and a reference to its parent.
 * A root environment also references the process-wide builtin table, which
 * is shared by every root and never copied.
 */
import type { BuiltinTable, FloValue } from "./values.js";
import { duplicateDefinition, immutableReassignment, undefinedVariable } from "./errors.js";

interface Binding {
  value: FloValue;
  mutable: boolean;
}

const EMPTY_TABLE: BuiltinTable = new Map();

export class Environment {
  private readonly bindings = new Map<string, Binding>();
  readonly parent: Environment | null;
  private readonly builtins: BuiltinTable;

  constructor(parent: Environment | null = null, builtins: BuiltinTable = EMPTY_TABLE) {
    this.parent = parent;
    this.builtins = parent === null ? builtins : EMPTY_TABLE;
  }

  static root(builtins: BuiltinTable): Environment {
    return new Environment(null, builtins);
  }

  child(): Environment {
    return new Environment(this);
  }

  /**
   * Define a name in this scope only. Shadowing a parent binding is fine;
   * defining the same name twice in one scope is not.
   */
  define(name: string, value: FloValue, mutable: boolean): void {
    if (this.bindings.has(name)) {
      throw duplicateDefinition(name);
    }
    this.bindings.set(name, { value, mutable });
  }

  get(name: string): FloValue {
    let scope: Environment | null = this;
    while (scope !== null) {
      const binding = scope.bindings.get(name);
      if (binding !== undefined) return binding.value;
      if (scope.parent === null) {
        const builtin = scope.builtins.get(name);
        if (builtin !== undefined) return builtin;
      }
      scope = scope.parent;
    }
    throw undefinedVariable(name);
  }

  set(name: string, value: FloValue): void {
    let scope: Environment | null = this;
    while (scope !== null) {
      const binding = scope.bindings.get(name);
      if (binding !== undefined) {
        if (!binding.mutable) {
          throw immutableReassignment(name);
        }
        binding.value = value;
        return;
      }
      if (scope.parent === null && scope.builtins.has(name)) {
        throw immutableReassignment(name);
      }
      scope = scope.parent;
    }
    throw undefinedVariable(name);
  }
}
