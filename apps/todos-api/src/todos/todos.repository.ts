import { NewTodo, PageRequest, Todo, TodoChanges, TodoWithItems } from '@todos/common/types';

/**
 * Todo persistence. Todos are always read together with their items,
 * ordered by id.
 */
export abstract class TodosRepository {
  abstract listByOwner(ownerId: string, page: PageRequest): Promise<TodoWithItems[]>;

  /**
   * Null when the todo does not exist or belongs to someone else
   */
  abstract findOwned(id: number, ownerId: string): Promise<TodoWithItems | null>;

  abstract create(todo: NewTodo): Promise<Todo>;

  abstract update(id: number, changes: TodoChanges): Promise<void>;

  /**
   * Deletes the todo and its items
   */
  abstract delete(id: number): Promise<void>;
}
