import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { TargetCharacteristics } from '../semantics/target.js';
import { makeSourceFile, pointSpan, posAtOffset } from './source.js';
import type {
  CommonBlock,
  DimSpec,
  EquivalenceObject,
  EquivalenceSet,
  IntrinsicCategory,
  Program,
  Scope,
  ScopeKind,
  SourceSpan,
  SymbolAttr,
  SymbolDetails,
  SymbolId,
  SymbolNode,
  SymbolTable,
  TypeSpec,
} from './symbols.js';
import { commonBlockLabel, isScopeKind, makeScope, SCOPE_KIND_NAMES } from './symbols.js';

/**
 * Default kinds used for type strings without an explicit kind and for implicit typing.
 */
export type DefaultKinds = Pick<
  TargetCharacteristics,
  'defaultIntegerKind' | 'defaultRealKind' | 'defaultCharacterKind'
>;

type JsonObject = Record<string, unknown>;

const scopeKinds = new Map<string, ScopeKind>();
for (const [kind, name] of Object.entries(SCOPE_KIND_NAMES)) {
  if (isScopeKind(kind)) scopeKinds.set(name, kind);
}

const entityKinds = new Map<string, SymbolDetails['kind']>([
  ['object', 'Object'],
  ['procedure', 'Procedure'],
  ['proc-pointer', 'ProcPointer'],
  ['generic', 'Generic'],
  ['other', 'Other'],
]);

const symbolAttrs: ReadonlySet<string> = new Set<SymbolAttr>(['allocatable', 'pointer', 'dummy']);

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function isSymbolAttr(value: unknown): value is SymbolAttr {
  return typeof value === 'string' && symbolAttrs.has(value);
}

const numericCategories: ReadonlySet<string> = new Set<IntrinsicCategory>([
  'integer',
  'real',
  'complex',
  'logical',
]);

function isNumericCategory(value: string | undefined): value is IntrinsicCategory {
  return value !== undefined && numericCategories.has(value);
}

const NAME_RE = /^[a-z_$][a-z0-9_$]*$/;

/**
 * Parse a declared type such as `integer(8)`, `real*8`, `double precision`, `character(len=10)`,
 * `type(point)`, `class(point)` or `class(*)`.
 *
 * Returns an error message for unsupported spellings.
 */
export function parseTypeSpec(text: string, kinds: DefaultKinds): TypeSpec | string {
  const t = text.trim().toLowerCase().replace(/\s+/g, ' ');

  if (t === 'double precision') {
    return { kind: 'IntrinsicType', category: 'real', typeKind: 2 * kinds.defaultRealKind };
  }
  if (t === 'double complex') {
    return { kind: 'IntrinsicType', category: 'complex', typeKind: 2 * kinds.defaultRealKind };
  }

  const numeric =
    /^(integer|real|complex|logical) ?(?:\( ?(?:kind ?= ?)?(\d+) ?\)|\* ?(\d+))?$/.exec(t);
  if (numeric) {
    const category = numeric[1];
    if (!isNumericCategory(category)) return `Unsupported type "${text}".`;
    const realBased = category === 'real' || category === 'complex';
    let typeKind = realBased ? kinds.defaultRealKind : kinds.defaultIntegerKind;
    if (numeric[2] !== undefined) {
      typeKind = Number(numeric[2]);
    } else if (numeric[3] !== undefined) {
      const bytes = Number(numeric[3]);
      // COMPLEX*16 is two REAL(8) parts.
      if (category === 'complex' && bytes % 2 !== 0) return `Unsupported type "${text}".`;
      typeKind = category === 'complex' ? bytes / 2 : bytes;
    }
    if (typeKind <= 0) return `Unsupported type "${text}".`;
    return { kind: 'IntrinsicType', category, typeKind };
  }

  const character = /^character ?(?:\((.*)\)|\* ?(\d+))?$/.exec(t);
  if (character) {
    let typeKind = kinds.defaultCharacterKind;
    let length: number | undefined = 1;
    if (character[2] !== undefined) {
      length = Number(character[2]);
    } else if (character[1] !== undefined) {
      const params = character[1].split(',').map((p) => p.trim());
      for (let i = 0; i < params.length; i++) {
        const param = params[i] ?? '';
        const keyword = /^(len|kind) ?= ?(.*)$/.exec(param);
        const name = keyword ? keyword[1] : i === 0 ? 'len' : 'kind';
        const value = keyword ? (keyword[2] ?? '') : param;
        if (name === 'len') {
          if (value === '*' || value === ':') {
            length = undefined;
          } else if (/^\d+$/.test(value)) {
            length = Number(value);
          } else {
            return `Unsupported character length "${value}" in type "${text}".`;
          }
        } else if (/^\d+$/.test(value)) {
          typeKind = Number(value);
        } else {
          return `Unsupported character kind "${value}" in type "${text}".`;
        }
      }
    }
    return {
      kind: 'IntrinsicType',
      category: 'character',
      typeKind,
      ...(length !== undefined ? { length } : {}),
    };
  }

  if (t === 'class(*)' || t === 'class (*)') return { kind: 'UnlimitedPolymorphic' };
  const derived = /^(type|class) ?\( ?([a-z_$][a-z0-9_$]*) ?\)$/.exec(t);
  if (derived && derived[2] !== undefined) {
    return { kind: 'DerivedType', name: derived[2], polymorphic: derived[1] === 'class' };
  }

  return `Unsupported type "${text}".`;
}

/**
 * Type of an untyped data object under the default implicit rules: `i`-`n` integer, others real.
 */
export function implicitType(name: string, kinds: DefaultKinds): TypeSpec {
  const first = name.charAt(0);
  const integer = first >= 'i' && first <= 'n';
  return {
    kind: 'IntrinsicType',
    category: integer ? 'integer' : 'real',
    typeKind: integer ? kinds.defaultIntegerKind : kinds.defaultRealKind,
  };
}

function jsonErrorOffset(err: unknown): number | undefined {
  if (!(err instanceof Error)) return undefined;
  const m = /position (\d+)/.exec(err.message);
  return m && m[1] !== undefined ? Number(m[1]) : undefined;
}

/**
 * Load a symbol-table description (JSON) into a {@link Program}.
 *
 * Format:
 * - top level: `{ "source"?: string, "scope": Scope }`; `source` names the program file that entity
 *   `line` numbers refer to (defaults to the description itself).
 * - scope: `{ kind, name?, line?, bindC?, kindParameterized?, lenParameters?, symbols?, common?,
 *   equivalence?, children? }`.
 * - symbol: `{ name, entity?, type?, dims?, attrs?, specific?, line? }`.
 * - common: `{ name, members, initialized?, line? }`; equivalence: list of sets of
 *   `name | { name, subscripts?, substring?, line? }`.
 *
 * Returns `undefined` (with diagnostics) when the description is malformed.
 */
export function parseProgramDescription(
  path: string,
  text: string,
  diagnostics: Diagnostic[],
  kinds: DefaultKinds,
): Program | undefined {
  const errorCountBefore = diagnostics.filter((d) => d.severity === 'error').length;
  const diag = (message: string, line?: number, column?: number) => {
    diagnostics.push({
      id: DiagnosticIds.InputError,
      severity: 'error',
      message,
      file: path,
      ...(line !== undefined ? { line } : {}),
      ...(column !== undefined ? { column } : {}),
    });
  };

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const offset = jsonErrorOffset(err);
    const message = `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`;
    if (offset === undefined) {
      diag(message);
    } else {
      const pos = posAtOffset(makeSourceFile(path, text), offset);
      diag(message, pos.line, pos.column);
    }
    return undefined;
  }

  if (!isObject(raw) || !isObject(raw['scope'])) {
    diag('Description must be an object with a "scope" object.');
    return undefined;
  }
  const sourceFile = typeof raw['source'] === 'string' ? raw['source'] : path;
  const table: SymbolTable = { symbols: [], derivedTypes: new Map() };

  const spanOf = (entry: JsonObject): SourceSpan | undefined => {
    const line = entry['line'];
    if (line === undefined) return undefined;
    if (!isInteger(line) || line < 1) return undefined;
    const column = entry['column'];
    return pointSpan(sourceFile, line, isInteger(column) && column > 0 ? column : 1);
  };

  const parseDims = (value: unknown, where: string): DimSpec[] | undefined => {
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      diag(`${where}: "dims" must be an array.`);
      return undefined;
    }
    const dims: DimSpec[] = [];
    for (const d of value) {
      if (isInteger(d)) {
        dims.push({ kind: 'Explicit', lower: 1, upper: d });
      } else if (Array.isArray(d) && d.length === 2 && isInteger(d[0]) && isInteger(d[1])) {
        dims.push({ kind: 'Explicit', lower: d[0], upper: d[1] });
      } else if (d === ':') {
        dims.push({ kind: 'Deferred' });
      } else if (d === '*') {
        dims.push({ kind: 'AssumedSize', lower: 1 });
      } else if (d === 'assumed') {
        dims.push({ kind: 'AssumedShape', lower: 1 });
      } else {
        diag(`${where}: unsupported dimension ${JSON.stringify(d)}.`);
        return undefined;
      }
    }
    return dims;
  };

  const parseSymbol = (value: unknown, where: string): SymbolNode | undefined => {
    if (!isObject(value) || typeof value['name'] !== 'string') {
      diag(`${where}: symbol must be an object with a "name".`);
      return undefined;
    }
    const name = value['name'].toLowerCase();
    if (!NAME_RE.test(name)) {
      diag(`${where}: invalid symbol name "${value['name']}".`);
      return undefined;
    }
    const at = `${where}: symbol "${name}"`;

    const entity = value['entity'] ?? 'object';
    const detailsKind = typeof entity === 'string' ? entityKinds.get(entity) : undefined;
    if (!detailsKind) {
      diag(`${at}: unsupported entity ${JSON.stringify(entity)}.`);
      return undefined;
    }

    let type: TypeSpec | undefined;
    if (value['type'] !== undefined) {
      if (typeof value['type'] !== 'string') {
        diag(`${at}: "type" must be a string.`);
        return undefined;
      }
      const parsed = parseTypeSpec(value['type'], kinds);
      if (typeof parsed === 'string') {
        diag(`${at}: ${parsed}`);
        return undefined;
      }
      type = parsed;
    } else if (detailsKind === 'Object') {
      type = implicitType(name, kinds);
    }

    const shape = parseDims(value['dims'], at);
    if (!shape) return undefined;

    const attrs = new Set<SymbolAttr>();
    const rawAttrs = value['attrs'] ?? [];
    if (!Array.isArray(rawAttrs)) {
      diag(`${at}: "attrs" must be an array.`);
      return undefined;
    }
    for (const a of rawAttrs) {
      if (!isSymbolAttr(a)) {
        diag(`${at}: unsupported attribute ${JSON.stringify(a)}.`);
        return undefined;
      }
      attrs.add(a);
    }

    let details: SymbolDetails;
    if (detailsKind === 'Generic') {
      let specific: SymbolId | undefined;
      if (value['specific'] !== undefined) {
        const shadowed = parseSymbol(value['specific'], `${at} specific`);
        if (!shadowed) return undefined;
        specific = shadowed.id;
      }
      details = specific !== undefined ? { kind: 'Generic', specific } : { kind: 'Generic' };
    } else {
      details = { kind: detailsKind };
    }

    const span = spanOf(value);
    const symbol: SymbolNode = {
      id: table.symbols.length,
      name,
      ...(span ? { span } : {}),
      details,
      ...(type ? { type } : {}),
      shape,
      attrs,
      offset: 0,
      size: 0,
    };
    table.symbols.push(symbol);
    return symbol;
  };

  const parseEquivalenceObject = (
    value: unknown,
    names: Map<string, SymbolNode>,
    where: string,
  ): EquivalenceObject | undefined => {
    const entry: JsonObject | undefined =
      typeof value === 'string' ? { name: value } : isObject(value) ? value : undefined;
    if (!entry || typeof entry['name'] !== 'string') {
      diag(`${where}: EQUIVALENCE object must be a name or an object with a "name".`);
      return undefined;
    }
    const name = entry['name'].toLowerCase();
    const symbol = names.get(name);
    if (!symbol) {
      diag(`${where}: EQUIVALENCE object "${name}" is not declared in this scope.`);
      return undefined;
    }

    const rawSubscripts = entry['subscripts'] ?? [];
    if (!Array.isArray(rawSubscripts) || !rawSubscripts.every(isInteger)) {
      diag(`${where}: subscripts of "${name}" must be integers.`);
      return undefined;
    }
    const subscripts: number[] = rawSubscripts;
    if (subscripts.length > 0) {
      if (subscripts.length !== symbol.shape.length) {
        diag(
          `${where}: "${name}" has rank ${symbol.shape.length} ` +
            `but ${subscripts.length} subscript(s).`,
        );
        return undefined;
      }
      for (let i = 0; i < subscripts.length; i++) {
        const dim = symbol.shape[i];
        const sub = subscripts[i] ?? 0;
        if (dim?.kind !== 'Explicit') {
          diag(`${where}: "${name}" needs explicit bounds to be subscripted in EQUIVALENCE.`);
          return undefined;
        }
        if (sub < dim.lower || sub > dim.upper) {
          diag(`${where}: subscript ${sub} of "${name}" is outside ${dim.lower}:${dim.upper}.`);
          return undefined;
        }
      }
    }

    const substring = entry['substring'];
    if (substring !== undefined) {
      const type = symbol.type;
      if (type?.kind !== 'IntrinsicType' || type.category !== 'character') {
        diag(`${where}: substring of non-character "${name}".`);
        return undefined;
      }
      if (!isInteger(substring) || substring < 1) {
        diag(`${where}: substring start of "${name}" must be a positive integer.`);
        return undefined;
      }
    }

    const span = spanOf(entry);
    return {
      symbol: symbol.id,
      subscripts,
      ...(isInteger(substring) ? { substringStart: substring } : {}),
      ...(span ? { span } : {}),
    };
  };

  const parseScope = (value: unknown, where: string): Scope | undefined => {
    if (!isObject(value)) {
      diag(`${where}: scope must be an object.`);
      return undefined;
    }
    const kindName = value['kind'];
    const kind = typeof kindName === 'string' ? scopeKinds.get(kindName) : undefined;
    if (!kind) {
      diag(
        `${where}: unsupported scope kind ${JSON.stringify(kindName)} ` +
          `(expected ${[...scopeKinds.keys()].join('|')}).`,
      );
      return undefined;
    }
    const rawName = value['name'];
    if (rawName !== undefined && typeof rawName !== 'string') {
      diag(`${where}: scope "name" must be a string.`);
      return undefined;
    }
    const name = rawName?.toLowerCase();
    const scope = makeScope(kind, name);
    const at = name !== undefined ? `${where} ${name}` : where;
    const span = spanOf(value);
    if (span) scope.span = span;
    scope.bindC = value['bindC'] === true;
    scope.kindParameterized = value['kindParameterized'] === true;
    const lenParameters = value['lenParameters'];
    if (isInteger(lenParameters) && lenParameters > 0) scope.lenParameterCount = lenParameters;

    if (kind === 'DerivedType') {
      if (name === undefined) {
        diag(`${where}: derived type scope requires a "name".`);
        return undefined;
      }
      if (table.derivedTypes.has(name)) {
        diag(`${at}: derived type "${name}" is defined more than once.`);
        return undefined;
      }
      table.derivedTypes.set(name, scope);
    }

    const names = new Map<string, SymbolNode>();
    const rawSymbols = value['symbols'] ?? [];
    if (!Array.isArray(rawSymbols)) {
      diag(`${at}: "symbols" must be an array.`);
      return undefined;
    }
    for (const rs of rawSymbols) {
      const symbol = parseSymbol(rs, at);
      if (!symbol) continue;
      if (names.has(symbol.name)) {
        diag(`${at}: symbol "${symbol.name}" is declared more than once.`);
        continue;
      }
      names.set(symbol.name, symbol);
      scope.symbols.push(symbol.id);
    }

    const rawCommon = value['common'] ?? [];
    if (!Array.isArray(rawCommon)) {
      diag(`${at}: "common" must be an array.`);
      return undefined;
    }
    for (const rc of rawCommon) {
      if (!isObject(rc) || typeof rc['name'] !== 'string' || !Array.isArray(rc['members'])) {
        diag(`${at}: COMMON block must be an object with "name" and "members".`);
        continue;
      }
      const blockName = rc['name'].toLowerCase();
      const label = commonBlockLabel(blockName);
      if (scope.commonBlocks.has(blockName)) {
        diag(`${at}: COMMON block ${label} is declared more than once.`);
        continue;
      }
      const members: SymbolId[] = [];
      for (const m of rc['members']) {
        const member = typeof m === 'string' ? names.get(m.toLowerCase()) : undefined;
        if (!member) {
          diag(`${at}: COMMON block ${label} member ${JSON.stringify(m)} is not declared.`);
          continue;
        }
        if (member.commonBlock !== undefined) {
          diag(
            `${at}: "${member.name}" appears in COMMON blocks ` +
              `${commonBlockLabel(member.commonBlock)} and ${label}.`,
          );
          continue;
        }
        member.commonBlock = blockName;
        members.push(member.id);
      }
      const blockSpan = spanOf(rc);
      const block: CommonBlock = {
        name: blockName,
        members,
        ...(blockSpan ? { span: blockSpan } : {}),
        initialized: rc['initialized'] === true,
        size: 0,
        alignment: 0,
      };
      scope.commonBlocks.set(blockName, block);
    }

    const rawEquivalence = value['equivalence'] ?? [];
    if (!Array.isArray(rawEquivalence)) {
      diag(`${at}: "equivalence" must be an array.`);
      return undefined;
    }
    for (const rawSet of rawEquivalence) {
      if (!Array.isArray(rawSet) || rawSet.length < 2) {
        diag(`${at}: EQUIVALENCE set must list at least two objects.`);
        continue;
      }
      const set: EquivalenceSet = [];
      for (const ro of rawSet) {
        const object = parseEquivalenceObject(ro, names, at);
        if (object) set.push(object);
      }
      if (set.length === rawSet.length) scope.equivalenceSets.push(set);
    }

    const rawChildren = value['children'] ?? [];
    if (!Array.isArray(rawChildren)) {
      diag(`${at}: "children" must be an array.`);
      return undefined;
    }
    for (const rc of rawChildren) {
      const child = parseScope(rc, at);
      if (child) scope.children.push(child);
    }
    return scope;
  };

  const root = parseScope(raw['scope'], 'scope');

  for (const symbol of table.symbols) {
    const type = symbol.type;
    if (type?.kind === 'DerivedType' && !table.derivedTypes.has(type.name)) {
      diag(`Symbol "${symbol.name}" has unknown derived type "${type.name}".`);
    }
  }

  const errorCountAfter = diagnostics.filter((d) => d.severity === 'error').length;
  if (!root || errorCountAfter > errorCountBefore) return undefined;
  return { file: path, table, root };
}
