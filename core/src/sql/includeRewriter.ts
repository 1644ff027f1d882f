import { producedResourceTypes, requiredResourceTypes } from '../expressions/builders.js';
import {
  isIncludeTableExpression,
  sqlRootExpression,
  tableExpression,
  type IncludeTableExpression,
  type SqlRootExpression,
  type TableExpression,
} from './tableExpression.js';

type IncludeNode = {
  readonly position: number;
  readonly entry: IncludeTableExpression;
  /** Positions of the include entries this one must follow. */
  readonly dependsOn: ReadonlySet<number>;
};

function isSynthesizedMarker(t: TableExpression): boolean {
  return t.kind === 'includeLimit' || t.kind === 'includeUnionAll';
}

function buildIncludeGraph(includes: readonly IncludeTableExpression[]): IncludeNode[] {
  const produced = includes.map((t) => new Set(producedResourceTypes(t.normalizedPredicate)));

  return includes.map((entry, position) => {
    const required = requiredResourceTypes(entry.normalizedPredicate);
    const dependsOn = new Set<number>();
    produced.forEach((types, other) => {
      if (other !== position && required.some((r) => types.has(r))) dependsOn.add(other);
    });
    return { position, entry, dependsOn };
  });
}

/** Reversed includes first, then submission order. */
function compareNodes(a: IncludeNode, b: IncludeNode): number {
  if (a.entry.normalizedPredicate.reversed !== b.entry.normalizedPredicate.reversed) {
    return a.entry.normalizedPredicate.reversed ? -1 : 1;
  }
  return a.position - b.position;
}

function pickNext(remaining: readonly IncludeNode[], placed: ReadonlySet<number>): IncludeNode | undefined {
  const ready = remaining.filter((n) => [...n.dependsOn].every((d) => placed.has(d)));
  // A cycle leaves nothing ready; fall back to the same tie-break over everything left.
  const candidates = ready.length ? ready : remaining;
  return [...candidates].sort(compareNodes)[0];
}

/**
 * Orders include entries so that every `:iterate` step comes after the steps
 * producing the resource types it reads. Cycles are broken by the tie-break
 * rather than rejected.
 */
export function orderIncludes(includes: readonly IncludeTableExpression[]): IncludeTableExpression[] {
  let remaining = buildIncludeGraph(includes);
  const placed = new Set<number>();
  const out: IncludeTableExpression[] = [];

  for (let next = pickNext(remaining, placed); next; next = pickNext(remaining, placed)) {
    const picked = next;
    out.push(picked.entry);
    placed.add(picked.position);
    remaining = remaining.filter((n) => n !== picked);
  }

  return out;
}

/**
 * Rewrites a plan into the order the SQL generator consumes: every other entry
 * (`all`, `top`, ...) in its original relative order, one `(include, includeLimit)`
 * pair per include in dependency order, and a closing `includeUnionAll`.
 *
 * Markers from an earlier rewrite are dropped first, so the rewrite can be
 * applied to its own output.
 */
export function rewriteIncludes(root: SqlRootExpression): SqlRootExpression {
  const entries = root.tableExpressions.filter((t) => !isSynthesizedMarker(t));
  const includes = entries.filter(isIncludeTableExpression);

  if (!includes.length) {
    if (entries.length === root.tableExpressions.length) return root;
    return sqlRootExpression(entries, root.resourceExpressions);
  }

  const reordered: TableExpression[] = entries.filter((t) => !isIncludeTableExpression(t));
  for (const include of orderIncludes(includes)) {
    reordered.push(include, tableExpression('includeLimit'));
  }
  reordered.push(tableExpression('includeUnionAll'));

  return sqlRootExpression(reordered, root.resourceExpressions);
}
