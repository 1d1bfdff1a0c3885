/** Transition recorded in every cell of the backtrace matrix. */
export enum EditOperation {
  NoEdit = 0,
  Insert = 1,
  Delete = 2,
  Replace = 3,
}

/** Label used for each step of an operation history. */
export type EditOperationKind = "no_edit" | "inserting" | "deleting" | "replacing";

export const OPERATION_KINDS: Readonly<Record<EditOperation, EditOperationKind>> = Object.freeze({
  [EditOperation.NoEdit]: "no_edit",
  [EditOperation.Insert]: "inserting",
  [EditOperation.Delete]: "deleting",
  [EditOperation.Replace]: "replacing",
});

/** Single symbol used when rendering the backtrace matrix. */
export const OPERATION_SYMBOLS: Readonly<Record<EditOperation, string>> = Object.freeze({
  [EditOperation.NoEdit]: "N",
  [EditOperation.Insert]: "I",
  [EditOperation.Delete]: "D",
  [EditOperation.Replace]: "R",
});

/**
 * One backtrace step. Indices are 1-based positions in the lowercased source
 * and target; the side an operation does not consume is `null`.
 */
export interface EditOperationRecord {
  readonly operation: EditOperationKind;
  readonly sourceIndex: number | null;
  readonly targetIndex: number | null;
  readonly sourceChar: string | null;
  readonly targetChar: string | null;
}

/**
 * Replays an operation history on `source` and returns the produced string.
 * Deletions drop the source character, insertions and replacements emit the
 * target character and `no_edit` steps copy the source character through.
 */
export function applyOperations(source: string, operations: readonly EditOperationRecord[]): string {
  const output: string[] = [];
  const sourceChars = Array.from(source);
  let cursor = 0;

  for (const step of operations) {
    switch (step.operation) {
      case "inserting":
        output.push(step.targetChar ?? "");
        break;
      case "deleting":
        cursor += 1;
        break;
      case "replacing":
        output.push(step.targetChar ?? "");
        cursor += 1;
        break;
      case "no_edit":
        output.push(sourceChars[cursor] ?? step.sourceChar ?? "");
        cursor += 1;
        break;
    }
  }

  return output.join("");
}
