/**
 * Hierarchy Path Builder
 *
 * Rebuilds tree identity from flat, level-annotated rows. The rows are a
 * pre-order walk of the tree, so a level → component stack is enough:
 * assigning level L replaces the entry at L and closes every deeper level.
 *
 * No recursion and no tree object; the stack lives for one call only.
 */

import type { PathedRow, Row } from "@treerecon/types";

export const COMPONENT_SEPARATOR = "__";
export const PATH_SEPARATOR = " > ";

const EMPTY_COMPONENT = renderComponent("", "");

/**
 * Path component of one row: its tag and name.
 */
export function renderComponent(tag: string, name: string): string {
  return `${tag}${COMPONENT_SEPARATOR}${name}`;
}

/**
 * Join of the last two non-empty components, or the whole path when fewer
 * than two exist. A component is empty when both its tag and name are.
 */
export function deriveParentChildKey(components: readonly string[]): string {
  const meaningful = components.filter((c) => c !== EMPTY_COMPONENT);
  if (meaningful.length < 2) {
    return components.join(PATH_SEPARATOR);
  }
  return meaningful.slice(-2).join(PATH_SEPARATOR);
}

/**
 * Augment rows with their hierarchy path and parent-child key.
 *
 * Rows are processed strictly in input order. A row without a level gets
 * no path and leaves the stack untouched. Never throws.
 */
export function buildHierarchy(rows: readonly Row[]): PathedRow[] {
  const stack = new Map<number, string>();

  return rows.map((row): PathedRow => {
    if (row.level === null) {
      return { ...row, path: null, parentChildKey: null };
    }

    const level = row.level;
    stack.set(level, renderComponent(row.tag, row.name));

    for (const registered of [...stack.keys()]) {
      if (registered > level) {
        stack.delete(registered);
      }
    }

    // Levels are whatever integers appear in the data; no dense range assumed
    const components = [...stack.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, component]) => component);

    return {
      ...row,
      path: components.join(PATH_SEPARATOR),
      parentChildKey: deriveParentChildKey(components),
    };
  });
}
