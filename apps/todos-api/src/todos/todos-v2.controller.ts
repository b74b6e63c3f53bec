/**
 * Todos Controller (v2)
 * Selected with `Accept: application/vnd.todos.v2+json`; wraps the page in
 * an envelope that reports the page and page size.
 */

import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { Principal } from '@todos/common/types';
import { AuthGuard } from '../auth/guards/auth.guard';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { ListTodosQueryDto, TodosPageResponseDto } from './dto/list-todos-query.dto';
import { serializeTodo, TodoResponse } from './todo.serializer';
import { TodosService } from './todos.service';

@Controller({ path: 'todos', version: 'v2' })
@UseGuards(AuthGuard)
export class TodosV2Controller {
  constructor(private todosService: TodosService) {}

  @Get()
  async list(
    @CurrentPrincipal() principal: Principal,
    @Query() query: ListTodosQueryDto,
  ): Promise<TodosPageResponseDto<TodoResponse>> {
    const page = query.page ?? 1;
    const todos = await this.todosService.list(principal, page);
    return {
      todos: todos.map(serializeTodo),
      page,
      per_page: this.todosService.pageSize,
    };
  }
}
