import { Injectable } from '@nestjs/common';
import { DatabaseService } from '@todos/common/database';
import { Item, ItemChanges, NewItem } from '@todos/common/types';
import { ITEM_COLUMNS, ItemRow, toItem } from './item.rows';
import { ItemsRepository } from './items.repository';

@Injectable()
export class PgItemsRepository extends ItemsRepository {
  constructor(private databaseService: DatabaseService) {
    super();
  }

  async listByTodo(todoId: number): Promise<Item[]> {
    const rows = await this.databaseService.queryMany<ItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM items WHERE todo_id = $1 ORDER BY id ASC`,
      [todoId],
    );
    return rows.map(toItem);
  }

  async findInTodo(todoId: number, id: number): Promise<Item | null> {
    const row = await this.databaseService.queryOne<ItemRow>(
      `SELECT ${ITEM_COLUMNS} FROM items WHERE todo_id = $1 AND id = $2`,
      [todoId, id],
    );
    return row ? toItem(row) : null;
  }

  async create(todoId: number, item: NewItem): Promise<Item> {
    const row = await this.databaseService.queryOne<ItemRow>(
      `INSERT INTO items (name, done, todo_id)
       VALUES ($1, $2, $3)
       RETURNING ${ITEM_COLUMNS}`,
      [item.name, item.done, todoId],
    );
    if (!row) {
      throw new Error('INSERT INTO items returned no row');
    }
    return toItem(row);
  }

  async update(id: number, changes: ItemChanges): Promise<void> {
    await this.databaseService.query(
      `UPDATE items
       SET name = COALESCE($2, name), done = COALESCE($3, done), updated_at = now()
       WHERE id = $1`,
      [id, changes.name ?? null, changes.done ?? null],
    );
  }

  async delete(id: number): Promise<void> {
    await this.databaseService.query('DELETE FROM items WHERE id = $1', [id]);
  }
}
