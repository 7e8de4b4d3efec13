import {
  DiagnosticEmitter,
  emitDiagnostic,
  rootLocation,
  type DefinitionLocation,
} from "./diagnostics/index.js";
import { IndexSpace } from "./index-space.js";
import { incrementValidatorPerfCounter } from "./perf.js";
import {
  moduleType,
  type DefKind,
  type DefType,
  type DefTypeOfKind,
  type ModuleType,
} from "./types/index.js";

/** The index spaces a scope owns: one per definition kind, plus types. */
export type Sort = DefKind | "type";

export type SortType<S extends Sort> = S extends DefKind
  ? DefTypeOfKind<S>
  : DefType;

export type SortLengths = Readonly<Record<Sort, number>>;

type IndexSpaces = { [S in Sort]: IndexSpace<SortType<S>> };

export type NamedDeclaration = "import" | "export";

export interface ScopeParent {
  scope: Scope;
  /** Lengths of the parent's spaces when the nested module was declared. */
  lengths: SortLengths;
}

const createIndexSpaces = (): IndexSpaces => ({
  type: new IndexSpace(),
  func: new IndexSpace(),
  table: new IndexSpace(),
  memory: new IndexSpace(),
  global: new IndexSpace(),
  instance: new IndexSpace(),
  module: new IndexSpace(),
});

const appendDef = (spaces: IndexSpaces, def: DefType): number => {
  switch (def.kind) {
    case "func":
      return spaces.func.append(def);
    case "table":
      return spaces.table.append(def);
    case "memory":
      return spaces.memory.append(def);
    case "global":
      return spaces.global.append(def);
    case "instance":
      return spaces.instance.append(def);
    case "module":
      return spaces.module.append(def);
  }
};

export class Scope {
  readonly parent?: ScopeParent;
  readonly diagnostics: DiagnosticEmitter;
  /** Location of the module this scope validates. */
  readonly location: DefinitionLocation;
  #spaces = createIndexSpaces();
  #imports = new Map<string, DefType>();
  #exports = new Map<string, DefType>();
  #cursor: DefinitionLocation;
  #frozen?: ModuleType;

  constructor({
    parent,
    location = rootLocation(),
    diagnostics = parent?.scope.diagnostics ?? new DiagnosticEmitter(),
  }: {
    parent?: ScopeParent;
    location?: DefinitionLocation;
    diagnostics?: DiagnosticEmitter;
  } = {}) {
    this.parent = parent;
    this.location = location;
    this.diagnostics = diagnostics;
    this.#cursor = location;
    incrementValidatorPerfCounter("scopes");
  }

  /** Number of lexically enclosing scopes. */
  get depth(): number {
    let depth = 0;
    let link = this.parent;
    while (link) {
      depth += 1;
      link = link.scope.parent;
    }
    return depth;
  }

  get isFrozen(): boolean {
    return this.#frozen !== undefined;
  }

  /** Location diagnostics are reported at, i.e. the definition being processed. */
  get cursor(): DefinitionLocation {
    return this.#cursor;
  }

  moveCursor(ordinal: number): DefinitionLocation {
    this.#cursor = {
      file: this.location.file,
      path: [...this.location.path, ordinal],
    };
    return this.#cursor;
  }

  lengths(): SortLengths {
    return {
      type: this.#spaces.type.length,
      func: this.#spaces.func.length,
      table: this.#spaces.table.length,
      memory: this.#spaces.memory.length,
      global: this.#spaces.global.length,
      instance: this.#spaces.instance.length,
      module: this.#spaces.module.length,
    };
  }

  /** Opens the scope of a module nested at the current cursor. */
  openChild(location: DefinitionLocation = this.#cursor): Scope {
    return new Scope({
      parent: { scope: this, lengths: this.lengths() },
      location,
      diagnostics: this.diagnostics,
    });
  }

  declare<S extends Sort>(sort: S, def: SortType<S>): number {
    this.#assertOpen();
    return this.#spaces[sort].append(def);
  }

  /** Appends `def` to the space of its own kind. */
  declareDef(def: DefType): number {
    this.#assertOpen();
    return appendDef(this.#spaces, def);
  }

  resolve<S extends Sort>(sort: S, index: number): SortType<S> {
    const space: IndexSpace<SortType<S>> = this.#spaces[sort];
    const def = space.get(index);
    if (def === undefined) {
      return emitDiagnostic({
        ctx: this,
        code: "LK0002",
        params: { kind: "unbound-index", sort, index, length: space.length },
        location: this.#cursor,
      });
    }
    return def;
  }

  /**
   * Imports also land in the space of their kind; exports are write-only and
   * the returned number is the export's ordinal.
   */
  declareNamed(which: NamedDeclaration, name: string, def: DefType): number {
    this.#assertOpen();
    const names = which === "import" ? this.#imports : this.#exports;
    if (names.has(name)) {
      return emitDiagnostic({
        ctx: this,
        code: "LK0001",
        params: {
          kind: which === "import" ? "duplicate-import" : "duplicate-export",
          name,
        },
        location: this.#cursor,
      });
    }
    names.set(name, def);
    return which === "import" ? appendDef(this.#spaces, def) : names.size - 1;
  }

  /**
   * Looks up `index` in the `sort` space of the ancestor `count` levels up
   * (0 is the direct parent), as it stood when this scope's branch of the
   * tree was declared.
   */
  resolveOuter<S extends Sort>(count: number, sort: S, index: number): SortType<S> {
    let link = this.parent;
    for (let level = 0; level < count && link; level += 1) {
      link = link.scope.parent;
    }

    if (!link || !Number.isInteger(count) || count < 0) {
      return emitDiagnostic({
        ctx: this,
        code: "LK0008",
        params: { kind: "alias-depth", count, available: this.depth },
        location: this.#cursor,
      });
    }

    const bound = link.lengths[sort];
    const space: IndexSpace<SortType<S>> = link.scope.#spaces[sort];
    const def = space.get(index, bound);
    if (def === undefined) {
      return emitDiagnostic({
        ctx: this,
        code: "LK0002",
        params: { kind: "unbound-index", sort, index, length: bound },
        location: this.#cursor,
      });
    }
    return def;
  }

  /** Ends the definition sequence; the type is stable from here on. */
  freeze(): ModuleType {
    if (!this.#frozen) {
      this.#frozen = moduleType({
        imports: this.#imports,
        exports: this.#exports,
      });
    }
    return this.#frozen;
  }

  #assertOpen(): void {
    if (this.#frozen) {
      throw new Error("cannot declare into a frozen scope");
    }
  }
}

export const createScope = (
  options: ConstructorParameters<typeof Scope>[0] = {}
): Scope => new Scope(options);

export const declare = <S extends Sort>(
  scope: Scope,
  sort: S,
  def: SortType<S>
): number => scope.declare(sort, def);

export const resolve = <S extends Sort>(
  scope: Scope,
  sort: S,
  index: number
): SortType<S> => scope.resolve(sort, index);

export const declareNamed = (
  scope: Scope,
  which: NamedDeclaration,
  name: string,
  def: DefType
): number => scope.declareNamed(which, name, def);
