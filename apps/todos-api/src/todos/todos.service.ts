/**
 * Todos Service
 * Todo CRUD scoped to the requesting principal
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { err, ok, Result } from 'neverthrow';
import { ApiError, ERRORS } from '@todos/common/errors';
import { Principal, TodoChanges, TodoWithItems } from '@todos/common/types';
import { DEFAULT_PAGE_SIZE } from './pagination';
import { todoViolations } from './todo.validation';
import { TodosRepository } from './todos.repository';

@Injectable()
export class TodosService {
  private readonly logger = new Logger(TodosService.name);
  readonly pageSize: number;

  constructor(
    private todosRepository: TodosRepository,
    configService: ConfigService,
  ) {
    this.pageSize = configService.get<number>('pageSize') ?? DEFAULT_PAGE_SIZE;
  }

  /**
   * One page of the principal's todos, oldest first
   */
  async list(principal: Principal, page = 1): Promise<TodoWithItems[]> {
    return this.todosRepository.listByOwner(ownerKey(principal), {
      page,
      perPage: this.pageSize,
    });
  }

  /**
   * Someone else's todo is reported exactly like a missing one
   */
  async get(principal: Principal, id: number): Promise<Result<TodoWithItems, ApiError>> {
    const todo = await this.todosRepository.findOwned(id, ownerKey(principal));
    return todo ? ok(todo) : err(ERRORS.NotFound('Todo', id));
  }

  async create(principal: Principal, title: string): Promise<Result<TodoWithItems, ApiError>> {
    const draft = { title, createdBy: ownerKey(principal) };
    const violations = todoViolations(draft);
    if (violations.length > 0) {
      return err(ERRORS.ValidationFailed(violations));
    }

    const todo = await this.todosRepository.create(draft);
    this.logger.log(`Todo ${todo.id} created by user ${principal.id}`);
    return ok({ ...todo, items: [] });
  }

  async update(
    principal: Principal,
    id: number,
    changes: TodoChanges,
  ): Promise<Result<void, ApiError>> {
    const violations = todoViolations(changes);
    if (violations.length > 0) {
      return err(ERRORS.ValidationFailed(violations));
    }

    const todo = await this.get(principal, id);
    if (todo.isErr()) {
      return err(todo.error);
    }

    await this.todosRepository.update(id, changes);
    return ok(undefined);
  }

  async remove(principal: Principal, id: number): Promise<Result<void, ApiError>> {
    const todo = await this.get(principal, id);
    if (todo.isErr()) {
      return err(todo.error);
    }

    await this.todosRepository.delete(id);
    this.logger.log(`Todo ${id} deleted by user ${principal.id}`);
    return ok(undefined);
  }
}

/**
 * Todos record their owner's id as text
 */
export function ownerKey(principal: Principal): string {
  return String(principal.id);
}
