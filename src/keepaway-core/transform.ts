import { checkedAdd, checkedMul } from './checked-math';
import type { Item, Operand, Operation } from './types';

function resolveOperand(operand: Operand, old: Item): bigint {
  switch (operand.kind) {
    case 'old':
      return old;
    case 'literal':
      return operand.value;
  }
}

/**
 * Computes the new worry level for an item. Throws OverflowError when the
 * result leaves the 64-bit range.
 */
export function applyOperation(operation: Operation, value: Item): Item {
  const left = resolveOperand(operation.left, value);
  const right = resolveOperand(operation.right, value);

  switch (operation.operator) {
    case 'add':
      return checkedAdd(left, right);
    case 'multiply':
      return checkedMul(left, right);
  }
}
