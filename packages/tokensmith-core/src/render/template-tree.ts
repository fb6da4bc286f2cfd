import { TemplateSyntaxError } from "../errors.ts";
import { tokenizeTemplate, type TemplatePart } from "../template/syntax.ts";

export type TreeNode =
  | { kind: "leaf"; part: TemplatePart }
  | { kind: "group"; open: string; capturing: boolean; body: Alternation };

export type TreeItem = {
  node: TreeNode;
  /** Minimum repetitions of the item; 1 when it carries no quantifier. */
  min: number;
};

export type Sequence = TreeItem[];

export type Alternation = Sequence[];

/** Nests a template's parts by group and alternation so it can be written out again. */
export function parseTemplateTree(source: string): Alternation {
  const parts = tokenizeTemplate(source);
  let index = 0;

  const parseAlternation = (depth: number): Alternation => {
    const branches: Alternation = [[]];
    while (index < parts.length) {
      const part = parts[index];
      index += 1;
      if (!part) {
        continue;
      }

      const branch = branches[branches.length - 1] ?? [];
      switch (part.kind) {
        case "close":
          if (depth === 0) {
            throw new TemplateSyntaxError(`Unbalanced ")" in template: ${source}`);
          }
          return branches;
        case "alternation":
          branches.push([]);
          break;
        case "quantifier": {
          const previous = branch[branch.length - 1];
          if (previous) {
            previous.min = minimumOf(part.value);
          }
          break;
        }
        case "open":
          branch.push({
            node: {
              kind: "group",
              open: part.value,
              capturing: part.capturing,
              body: parseAlternation(depth + 1),
            },
            min: 1,
          });
          break;
        default:
          branch.push({ node: { kind: "leaf", part }, min: 1 });
      }
    }

    if (depth > 0) {
      throw new TemplateSyntaxError(`Unbalanced "(" in template: ${source}`);
    }
    return branches;
  };

  return parseAlternation(0);
}

function minimumOf(quantifier: string): number {
  if (quantifier.startsWith("+")) {
    return 1;
  }
  const bounded = /^\{(\d+)/.exec(quantifier);
  return bounded ? Number(bounded[1]) : 0;
}
