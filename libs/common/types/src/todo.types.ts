/**
 * Todos Domain Types
 */

export interface Todo {
  id: number;
  title: string;
  // owner's user id, stored as text
  createdBy: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Item {
  id: number;
  name: string;
  done: boolean;
  todoId: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface TodoWithItems extends Todo {
  items: Item[];
}

export interface NewTodo {
  title: string;
  createdBy: string;
}

export interface TodoChanges {
  title?: string;
}

export interface NewItem {
  name: string;
  done: boolean;
}

export interface ItemChanges {
  name?: string;
  done?: boolean;
}

export interface PageRequest {
  page: number; // 1-based
  perPage: number;
}
