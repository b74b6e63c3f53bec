/**
 * JSON shapes of todos and items
 */

import { Item, TodoWithItems } from '@todos/common/types';

export interface ItemResponse {
  id: number;
  name: string;
  done: boolean;
  todo_id: number;
  created_at: string;
  updated_at: string;
}

export interface TodoResponse {
  id: number;
  title: string;
  created_by: string;
  created_at: string;
  updated_at: string;
  items: ItemResponse[];
}

export function serializeItem(item: Item): ItemResponse {
  return {
    id: item.id,
    name: item.name,
    done: item.done,
    todo_id: item.todoId,
    created_at: item.createdAt.toISOString(),
    updated_at: item.updatedAt.toISOString(),
  };
}

export function serializeTodo(todo: TodoWithItems): TodoResponse {
  return {
    id: todo.id,
    title: todo.title,
    created_by: todo.createdBy,
    created_at: todo.createdAt.toISOString(),
    updated_at: todo.updatedAt.toISOString(),
    items: todo.items.map(serializeItem),
  };
}
