import { Item, ItemChanges, NewItem } from '@todos/common/types';

export abstract class ItemsRepository {
  abstract listByTodo(todoId: number): Promise<Item[]>;

  abstract findInTodo(todoId: number, id: number): Promise<Item | null>;

  abstract create(todoId: number, item: NewItem): Promise<Item>;

  abstract update(id: number, changes: ItemChanges): Promise<void>;

  abstract delete(id: number): Promise<void>;
}
