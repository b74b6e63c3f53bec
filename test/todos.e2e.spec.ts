import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { JwtService } from '@todos/common/jwt';
import { AppModule } from '../apps/todos-api/src/app.module';
import { configureApp } from '../apps/todos-api/src/app.setup';
import { UsersRepository } from '../apps/todos-api/src/users/users.repository';
import { TodosRepository } from '../apps/todos-api/src/todos/todos.repository';
import { ItemsRepository } from '../apps/todos-api/src/items/items.repository';
import {
  InMemoryItemsRepository,
  InMemoryTodosRepository,
  InMemoryUsersRepository,
} from './support/in-memory-repositories';

const V2 = 'application/vnd.todos.v2+json';

describe('Todos API (e2e)', () => {
  let app: INestApplication;
  let jwtService: JwtService;
  let usersRepository: InMemoryUsersRepository;

  const signup = (name: string, email: string, password = 'correct-horse') =>
    request(app.getHttpServer())
      .post('/signup')
      .send({ name, email, password, password_confirmation: password });

  beforeEach(async () => {
    usersRepository = new InMemoryUsersRepository();
    const itemsRepository = new InMemoryItemsRepository();
    const todosRepository = new InMemoryTodosRepository(itemsRepository);

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(UsersRepository)
      .useValue(usersRepository)
      .overrideProvider(TodosRepository)
      .useValue(todosRepository)
      .overrideProvider(ItemsRepository)
      .useValue(itemsRepository)
      .compile();

    app = moduleFixture.createNestApplication();
    configureApp(app);
    await app.init();

    jwtService = app.get(JwtService);
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /signup', () => {
    it('creates the account and returns a token for it', async () => {
      const response = await signup('Ada', 'ada@example.com').expect(201);

      expect(response.body.message).toBe('Account created successfully');
      expect(jwtService.decode(response.body.auth_token)._unsafeUnwrap().sub).toBe(1);
    });

    it('rejects an email that is already registered', async () => {
      await signup('Ada', 'ada@example.com').expect(201);

      const response = await signup('Ada', 'ada@example.com').expect(422);

      expect(response.body).toEqual({
        message: 'Validation failed: Email has already been taken',
      });
    });

    it('rejects an invalid email', async () => {
      const response = await signup('Ada', 'not-an-email').expect(422);

      expect(response.body).toEqual({ message: 'Validation failed: Email is invalid' });
    });

    it('rejects a mismatched confirmation', async () => {
      const response = await request(app.getHttpServer())
        .post('/signup')
        .send({
          name: 'Ada',
          email: 'ada@example.com',
          password: 'correct-horse',
          password_confirmation: 'other-horse',
        })
        .expect(422);

      expect(response.body).toEqual({
        message: "Validation failed: Password confirmation doesn't match Password",
      });
    });
  });

  describe('POST /auth/login', () => {
    beforeEach(async () => {
      await signup('Ada', 'ada@example.com').expect(201);
    });

    it('returns a token for valid credentials', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'ada@example.com', password: 'correct-horse' })
        .expect(200);

      expect(jwtService.decode(response.body.auth_token)._unsafeUnwrap().sub).toBe(1);
    });

    it('rejects a wrong password', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'ada@example.com', password: 'wrong-horse' })
        .expect(401);

      expect(response.body).toEqual({ message: 'Invalid credentials' });
    });

    it('rejects a missing password the same way', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'ada@example.com' })
        .expect(401);

      expect(response.body).toEqual({ message: 'Invalid credentials' });
    });
  });

  describe('authorization', () => {
    let token: string;

    beforeEach(async () => {
      token = (await signup('Ada', 'ada@example.com').expect(201)).body.auth_token;
    });

    it('requires a token', async () => {
      const response = await request(app.getHttpServer()).get('/todos').expect(401);

      expect(response.body).toEqual({ message: 'Missing token' });
    });

    it('rejects a forged token', async () => {
      const response = await request(app.getHttpServer())
        .get('/todos')
        .set('Authorization', 'Bearer not.a.token')
        .expect(401);

      expect(response.body).toEqual({ message: 'Invalid token' });
    });

    it('rejects an expired token', async () => {
      const expired = jwtService.encode({ sub: 1 }, new Date(Date.now() - 1000));

      const response = await request(app.getHttpServer())
        .get('/todos')
        .set('Authorization', `Bearer ${expired}`)
        .expect(401);

      expect(response.body).toEqual({
        message: 'Sorry, your token has expired. Please login to continue.',
      });
    });

    it('rejects the token of a deleted user', async () => {
      usersRepository.remove(1);

      const response = await request(app.getHttpServer())
        .get('/todos')
        .set('Authorization', `Bearer ${token}`)
        .expect(401);

      expect(response.body).toEqual({ message: 'Invalid token' });
    });

    it('leaves the health check open', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body.status).toBe('healthy');
    });
  });

  describe('todos', () => {
    let adaToken: string;
    let bobToken: string;

    const createTodo = (token: string, title: string) =>
      request(app.getHttpServer())
        .post('/todos')
        .set('Authorization', `Bearer ${token}`)
        .send({ title });

    beforeEach(async () => {
      adaToken = (await signup('Ada', 'ada@example.com').expect(201)).body.auth_token;
      bobToken = (await signup('Bob', 'bob@example.com').expect(201)).body.auth_token;
    });

    it("lists only the principal's todos, 20 per page", async () => {
      for (let n = 1; n <= 25; n++) {
        await createTodo(adaToken, `Ada todo ${n}`).expect(201);
      }
      await createTodo(bobToken, 'Bob todo').expect(201);

      const firstPage = await request(app.getHttpServer())
        .get('/todos')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(200);
      const secondPage = await request(app.getHttpServer())
        .get('/todos?page=2')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(200);

      expect(firstPage.body).toHaveLength(20);
      expect(firstPage.body[0]).toMatchObject({ title: 'Ada todo 1', created_by: '1', items: [] });
      expect(secondPage.body).toHaveLength(5);
      expect(secondPage.body[4].title).toBe('Ada todo 25');
    });

    it('serves the v2 listing when the Accept header asks for it', async () => {
      await createTodo(adaToken, 'Groceries').expect(201);

      const response = await request(app.getHttpServer())
        .get('/todos')
        .set('Authorization', `Bearer ${adaToken}`)
        .set('Accept', V2)
        .expect(200);

      expect(response.body.page).toBe(1);
      expect(response.body.per_page).toBe(20);
      expect(response.body.todos).toHaveLength(1);
      expect(response.body.todos[0].title).toBe('Groceries');
    });

    it('falls back to v1 for paths v2 does not serve', async () => {
      await createTodo(adaToken, 'Groceries').expect(201);

      const response = await request(app.getHttpServer())
        .get('/todos/1')
        .set('Authorization', `Bearer ${adaToken}`)
        .set('Accept', V2)
        .expect(200);

      expect(response.body.title).toBe('Groceries');
    });

    it('rejects a blank title', async () => {
      const response = await createTodo(adaToken, '').expect(422);

      expect(response.body).toEqual({ message: "Validation failed: Title can't be blank" });
    });

    it('rejects an invalid page', async () => {
      const response = await request(app.getHttpServer())
        .get('/todos?page=0')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(422);

      expect(response.body).toEqual({
        message: 'Validation failed: Page must be greater than or equal to 1',
      });
    });

    it.each(['1000000000000000000000', '1000001'])('rejects page %s as too large', async (page) => {
      const response = await request(app.getHttpServer())
        .get(`/todos?page=${page}`)
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(422);

      expect(response.body).toEqual({
        message: 'Validation failed: Page must be less than or equal to 1000000',
      });
    });

    it('accepts the largest allowed page', async () => {
      const response = await request(app.getHttpServer())
        .get('/todos?page=1000000')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(200);

      expect(response.body).toEqual([]);
    });

    it('rejects undeclared query and body keys', async () => {
      const query = await request(app.getHttpServer())
        .get('/todos?sort=title')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(422);
      const body = await request(app.getHttpServer())
        .post('/todos')
        .set('Authorization', `Bearer ${adaToken}`)
        .send({ title: 'Groceries', done: true })
        .expect(422);

      expect(query.body).toEqual({ message: 'Validation failed: Unpermitted parameter: sort' });
      expect(body.body).toEqual({ message: 'Validation failed: Unpermitted parameter: done' });
    });

    it("reports another user's todo as not found", async () => {
      await createTodo(adaToken, 'Private').expect(201);

      const response = await request(app.getHttpServer())
        .get('/todos/1')
        .set('Authorization', `Bearer ${bobToken}`)
        .expect(404);

      expect(response.body).toEqual({ message: "Couldn't find Todo with 'id'=1" });
    });

    it('updates and deletes a todo', async () => {
      await createTodo(adaToken, 'Draft').expect(201);

      await request(app.getHttpServer())
        .put('/todos/1')
        .set('Authorization', `Bearer ${adaToken}`)
        .send({ title: 'Final' })
        .expect(204);
      const updated = await request(app.getHttpServer())
        .get('/todos/1')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(200);
      expect(updated.body.title).toBe('Final');

      await request(app.getHttpServer())
        .delete('/todos/1')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(204);
      await request(app.getHttpServer())
        .get('/todos/1')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(404);
    });

    it('adds items and returns the parent todo', async () => {
      await createTodo(adaToken, 'Groceries').expect(201);

      const response = await request(app.getHttpServer())
        .post('/todos/1/items')
        .set('Authorization', `Bearer ${adaToken}`)
        .send({ name: 'Milk' })
        .expect(201);

      expect(response.body.id).toBe(1);
      expect(response.body.items).toHaveLength(1);
      expect(response.body.items[0]).toMatchObject({ id: 1, name: 'Milk', done: false, todo_id: 1 });

      await request(app.getHttpServer())
        .put('/todos/1/items/1')
        .set('Authorization', `Bearer ${adaToken}`)
        .send({ done: true })
        .expect(204);
      const item = await request(app.getHttpServer())
        .get('/todos/1/items/1')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(200);
      expect(item.body.done).toBe(true);
    });

    it('reports a missing item as not found', async () => {
      await createTodo(adaToken, 'Groceries').expect(201);

      const response = await request(app.getHttpServer())
        .get('/todos/1/items/7')
        .set('Authorization', `Bearer ${adaToken}`)
        .expect(404);

      expect(response.body).toEqual({ message: "Couldn't find Item with 'id'=7" });
    });
  });

  it('shapes unknown routes like every other error', async () => {
    const response = await request(app.getHttpServer()).get('/nowhere').expect(404);

    expect(response.body).toEqual({ message: 'Cannot GET /nowhere' });
  });
});
