import { NewItem, NewTodo } from '@todos/common/types';

/**
 * Presence rules for todos and items, applied before every write.
 */
export function todoViolations(todo: Partial<NewTodo>): string[] {
  const violations: string[] = [];
  if (todo.title !== undefined && !todo.title.trim()) {
    violations.push("Title can't be blank");
  }
  if (todo.createdBy !== undefined && !todo.createdBy.trim()) {
    violations.push("Created by can't be blank");
  }
  return violations;
}

export function itemViolations(item: Partial<NewItem>): string[] {
  if (item.name !== undefined && !item.name.trim()) {
    return ["Name can't be blank"];
  }
  return [];
}
