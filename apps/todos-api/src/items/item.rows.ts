import { Item } from '@todos/common/types';

export interface ItemRow {
  id: number;
  name: string;
  done: boolean;
  todo_id: number;
  created_at: Date;
  updated_at: Date;
}

export const ITEM_COLUMNS = 'id, name, done, todo_id, created_at, updated_at';

export function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    name: row.name,
    done: row.done,
    todoId: row.todo_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
