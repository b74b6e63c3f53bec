/**
 * Todos Controller (v1, default version)
 */

import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  Query,
  UseGuards,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { orThrow } from '@todos/common/errors';
import { Principal } from '@todos/common/types';
import { AuthGuard } from '../auth/guards/auth.guard';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { CreateTodoDto } from './dto/create-todo.dto';
import { UpdateTodoDto } from './dto/update-todo.dto';
import { ListTodosQueryDto } from './dto/list-todos-query.dto';
import { ParseIdPipe } from './parse-id.pipe';
import { serializeTodo, TodoResponse } from './todo.serializer';
import { TodosService } from './todos.service';

@Controller({ path: 'todos', version: 'v1' })
@UseGuards(AuthGuard)
export class TodosController {
  constructor(private todosService: TodosService) {}

  @Get()
  async list(
    @CurrentPrincipal() principal: Principal,
    @Query() query: ListTodosQueryDto,
  ): Promise<TodoResponse[]> {
    const todos = await this.todosService.list(principal, query.page);
    return todos.map(serializeTodo);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: CreateTodoDto,
  ): Promise<TodoResponse> {
    return serializeTodo(orThrow(await this.todosService.create(principal, dto.title)));
  }

  @Get(':id')
  async show(
    @CurrentPrincipal() principal: Principal,
    @Param('id', new ParseIdPipe('Todo')) id: number,
  ): Promise<TodoResponse> {
    return serializeTodo(orThrow(await this.todosService.get(principal, id)));
  }

  @Put(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async update(
    @CurrentPrincipal() principal: Principal,
    @Param('id', new ParseIdPipe('Todo')) id: number,
    @Body() dto: UpdateTodoDto,
  ): Promise<void> {
    orThrow(await this.todosService.update(principal, id, { title: dto.title }));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentPrincipal() principal: Principal,
    @Param('id', new ParseIdPipe('Todo')) id: number,
  ): Promise<void> {
    orThrow(await this.todosService.remove(principal, id));
  }
}
