/**
 * Items Controller (v1)
 * Items are always addressed through their todo
 */

import {
  Controller,
  Get,
  Post,
  Put,
  Delete,
  Body,
  Param,
  UseGuards,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { orThrow } from '@todos/common/errors';
import { Principal } from '@todos/common/types';
import { AuthGuard } from '../auth/guards/auth.guard';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import { ParseIdPipe } from '../todos/parse-id.pipe';
import {
  ItemResponse,
  serializeItem,
  serializeTodo,
  TodoResponse,
} from '../todos/todo.serializer';
import { CreateItemDto } from './dto/create-item.dto';
import { UpdateItemDto } from './dto/update-item.dto';
import { ItemsService } from './items.service';

@Controller({ path: 'todos/:todoId/items', version: 'v1' })
@UseGuards(AuthGuard)
export class ItemsController {
  constructor(private itemsService: ItemsService) {}

  @Get()
  async list(
    @CurrentPrincipal() principal: Principal,
    @Param('todoId', new ParseIdPipe('Todo')) todoId: number,
  ): Promise<ItemResponse[]> {
    return orThrow(await this.itemsService.list(principal, todoId)).map(serializeItem);
  }

  @Get(':id')
  async show(
    @CurrentPrincipal() principal: Principal,
    @Param('todoId', new ParseIdPipe('Todo')) todoId: number,
    @Param('id', new ParseIdPipe('Item')) id: number,
  ): Promise<ItemResponse> {
    return serializeItem(orThrow(await this.itemsService.get(principal, todoId, id)));
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @CurrentPrincipal() principal: Principal,
    @Param('todoId', new ParseIdPipe('Todo')) todoId: number,
    @Body() dto: CreateItemDto,
  ): Promise<TodoResponse> {
    const todo = orThrow(
      await this.itemsService.create(principal, todoId, { name: dto.name, done: dto.done }),
    );
    return serializeTodo(todo);
  }

  @Put(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async update(
    @CurrentPrincipal() principal: Principal,
    @Param('todoId', new ParseIdPipe('Todo')) todoId: number,
    @Param('id', new ParseIdPipe('Item')) id: number,
    @Body() dto: UpdateItemDto,
  ): Promise<void> {
    orThrow(
      await this.itemsService.update(principal, todoId, id, { name: dto.name, done: dto.done }),
    );
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @CurrentPrincipal() principal: Principal,
    @Param('todoId', new ParseIdPipe('Todo')) todoId: number,
    @Param('id', new ParseIdPipe('Item')) id: number,
  ): Promise<void> {
    orThrow(await this.itemsService.remove(principal, todoId, id));
  }
}
