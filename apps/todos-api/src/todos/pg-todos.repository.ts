import { Injectable } from '@nestjs/common';
import { DatabaseService } from '@todos/common/database';
import { Item, NewTodo, PageRequest, Todo, TodoChanges, TodoWithItems } from '@todos/common/types';
import { ITEM_COLUMNS, ItemRow, toItem } from '../items/item.rows';
import { pageWindow } from './pagination';
import { TodosRepository } from './todos.repository';

interface TodoRow {
  id: number;
  title: string;
  created_by: string;
  created_at: Date;
  updated_at: Date;
}

const TODO_COLUMNS = 'id, title, created_by, created_at, updated_at';

@Injectable()
export class PgTodosRepository extends TodosRepository {
  constructor(private databaseService: DatabaseService) {
    super();
  }

  async listByOwner(ownerId: string, page: PageRequest): Promise<TodoWithItems[]> {
    const { limit, offset } = pageWindow(page);
    const rows = await this.databaseService.queryMany<TodoRow>(
      `SELECT ${TODO_COLUMNS}
       FROM todos
       WHERE created_by = $1
       ORDER BY id ASC
       LIMIT $2 OFFSET $3`,
      [ownerId, limit, offset],
    );
    return this.withItems(rows);
  }

  async findOwned(id: number, ownerId: string): Promise<TodoWithItems | null> {
    const row = await this.databaseService.queryOne<TodoRow>(
      `SELECT ${TODO_COLUMNS} FROM todos WHERE id = $1 AND created_by = $2`,
      [id, ownerId],
    );
    if (!row) {
      return null;
    }
    const [todo] = await this.withItems([row]);
    return todo;
  }

  async create(todo: NewTodo): Promise<Todo> {
    const row = await this.databaseService.queryOne<TodoRow>(
      `INSERT INTO todos (title, created_by)
       VALUES ($1, $2)
       RETURNING ${TODO_COLUMNS}`,
      [todo.title, todo.createdBy],
    );
    if (!row) {
      throw new Error('INSERT INTO todos returned no row');
    }
    return toTodo(row);
  }

  async update(id: number, changes: TodoChanges): Promise<void> {
    await this.databaseService.query(
      `UPDATE todos
       SET title = COALESCE($2, title), updated_at = now()
       WHERE id = $1`,
      [id, changes.title ?? null],
    );
  }

  async delete(id: number): Promise<void> {
    // items go with it (ON DELETE CASCADE)
    await this.databaseService.query('DELETE FROM todos WHERE id = $1', [id]);
  }

  private async withItems(rows: TodoRow[]): Promise<TodoWithItems[]> {
    if (rows.length === 0) {
      return [];
    }

    const itemRows = await this.databaseService.queryMany<ItemRow>(
      `SELECT ${ITEM_COLUMNS}
       FROM items
       WHERE todo_id = ANY($1::int[])
       ORDER BY id ASC`,
      [rows.map((row) => row.id)],
    );

    const itemsByTodo = new Map<number, Item[]>();
    for (const itemRow of itemRows) {
      const items = itemsByTodo.get(itemRow.todo_id) ?? [];
      items.push(toItem(itemRow));
      itemsByTodo.set(itemRow.todo_id, items);
    }

    return rows.map((row) => ({ ...toTodo(row), items: itemsByTodo.get(row.id) ?? [] }));
  }
}

function toTodo(row: TodoRow): Todo {
  return {
    id: row.id,
    title: row.title,
    createdBy: row.created_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
