/**
 * Todos Module
 * Todos and their items, behind AuthGuard
 */

import { Module } from '@nestjs/common';
import { DatabaseModule } from '@todos/common/database';
import { AuthModule } from '../auth/auth.module';
import { ItemsController } from '../items/items.controller';
import { ItemsRepository } from '../items/items.repository';
import { ItemsService } from '../items/items.service';
import { PgItemsRepository } from '../items/pg-items.repository';
import { PgTodosRepository } from './pg-todos.repository';
import { TodosController } from './todos.controller';
import { TodosRepository } from './todos.repository';
import { TodosService } from './todos.service';
import { TodosV2Controller } from './todos-v2.controller';

@Module({
  imports: [DatabaseModule, AuthModule],
  // Newer versions first: Nest tries same-path handlers in registration order
  controllers: [TodosV2Controller, TodosController, ItemsController],
  providers: [
    TodosService,
    ItemsService,
    { provide: TodosRepository, useClass: PgTodosRepository },
    { provide: ItemsRepository, useClass: PgItemsRepository },
  ],
})
export class TodosModule {}
