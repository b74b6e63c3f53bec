/**
 * Items Service
 * Item CRUD; every call first resolves the parent todo for the principal
 */

import { Injectable } from '@nestjs/common';
import { err, ok, Result } from 'neverthrow';
import { ApiError, ERRORS } from '@todos/common/errors';
import { Item, ItemChanges, Principal, TodoWithItems } from '@todos/common/types';
import { itemViolations } from '../todos/todo.validation';
import { TodosService } from '../todos/todos.service';
import { ItemsRepository } from './items.repository';

export interface ItemDraft {
  name: string;
  done?: boolean;
}

@Injectable()
export class ItemsService {
  constructor(
    private itemsRepository: ItemsRepository,
    private todosService: TodosService,
  ) {}

  async list(principal: Principal, todoId: number): Promise<Result<Item[], ApiError>> {
    const todo = await this.todosService.get(principal, todoId);
    if (todo.isErr()) {
      return err(todo.error);
    }
    return ok(await this.itemsRepository.listByTodo(todoId));
  }

  async get(
    principal: Principal,
    todoId: number,
    id: number,
  ): Promise<Result<Item, ApiError>> {
    const todo = await this.todosService.get(principal, todoId);
    if (todo.isErr()) {
      return err(todo.error);
    }
    const item = await this.itemsRepository.findInTodo(todoId, id);
    return item ? ok(item) : err(ERRORS.NotFound('Item', id));
  }

  /**
   * Returns the parent todo with the new item among its items
   */
  async create(
    principal: Principal,
    todoId: number,
    draft: ItemDraft,
  ): Promise<Result<TodoWithItems, ApiError>> {
    const violations = itemViolations(draft);
    if (violations.length > 0) {
      return err(ERRORS.ValidationFailed(violations));
    }

    const todo = await this.todosService.get(principal, todoId);
    if (todo.isErr()) {
      return err(todo.error);
    }

    const item = await this.itemsRepository.create(todoId, {
      name: draft.name,
      done: draft.done ?? false,
    });
    return ok({ ...todo.value, items: [...todo.value.items, item] });
  }

  async update(
    principal: Principal,
    todoId: number,
    id: number,
    changes: ItemChanges,
  ): Promise<Result<void, ApiError>> {
    const violations = itemViolations(changes);
    if (violations.length > 0) {
      return err(ERRORS.ValidationFailed(violations));
    }

    const item = await this.get(principal, todoId, id);
    if (item.isErr()) {
      return err(item.error);
    }

    await this.itemsRepository.update(id, changes);
    return ok(undefined);
  }

  async remove(principal: Principal, todoId: number, id: number): Promise<Result<void, ApiError>> {
    const item = await this.get(principal, todoId, id);
    if (item.isErr()) {
      return err(item.error);
    }

    await this.itemsRepository.delete(id);
    return ok(undefined);
  }
}
