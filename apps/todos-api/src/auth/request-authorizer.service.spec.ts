import { ErrorCode } from '@todos/common/errors';
import { InMemoryUsersRepository } from '../../../../test/support/in-memory-repositories';
import { createJwtService } from '../../../../test/support/jwt';
import { AuthorizableRequest } from './auth.types';
import { RequestAuthorizer } from './request-authorizer.service';

describe('RequestAuthorizer', () => {
  const jwtService = createJwtService();
  const inOneHour = () => new Date(Date.now() + 60 * 60 * 1000);
  let usersRepository: InMemoryUsersRepository;
  let authorizer: RequestAuthorizer;
  let token: string;

  beforeEach(async () => {
    usersRepository = new InMemoryUsersRepository();
    await usersRepository.create({
      name: 'Ada',
      email: 'ada@example.com',
      passwordDigest: 'digest',
    });
    authorizer = new RequestAuthorizer(jwtService, usersRepository);
    token = jwtService.encode({ sub: 1 }, inOneHour());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('resolves the principal of a bearer token', async () => {
    const principal = (await authorizer.authorize({ authorization: `Bearer ${token}` }))._unsafeUnwrap();

    expect(principal).toEqual({ id: 1, name: 'Ada', email: 'ada@example.com' });
  });

  it.each([
    ['without a scheme', (t: string) => t],
    ['with another scheme word', (t: string) => `Token ${t}`],
    ['with extra whitespace', (t: string) => `  Bearer \t ${t}  `],
  ])('takes the last segment of the header %s', async (_case, header) => {
    const result = await authorizer.authorize({ authorization: header(token) });

    expect(result._unsafeUnwrap().id).toBe(1);
  });

  it('fails with MissingToken without an Authorization header', async () => {
    const error = (await authorizer.authorize({}))._unsafeUnwrapErr();

    expect(error.code).toBe(ErrorCode.MissingToken);
    expect(error.message).toBe('Missing token');
  });

  it('fails with MissingToken for a blank Authorization header', async () => {
    const error = (await authorizer.authorize({ authorization: '   ' }))._unsafeUnwrapErr();

    expect(error.code).toBe(ErrorCode.MissingToken);
  });

  it('fails with ExpiredToken for an expired token', async () => {
    const expired = jwtService.encode({ sub: 1 }, new Date(Date.now() - 1000));

    const error = (await authorizer.authorize({ authorization: `Bearer ${expired}` }))._unsafeUnwrapErr();

    expect(error.code).toBe(ErrorCode.ExpiredToken);
  });

  it('fails with InvalidToken for a garbled token', async () => {
    const error = (await authorizer.authorize({ authorization: 'Bearer garbage' }))._unsafeUnwrapErr();

    expect(error.code).toBe(ErrorCode.InvalidToken);
  });

  it('fails with InvalidToken once the user is gone', async () => {
    usersRepository.remove(1);

    const error = (await authorizer.authorize({ authorization: `Bearer ${token}` }))._unsafeUnwrapErr();

    expect(error.code).toBe(ErrorCode.InvalidToken);
    expect(error.message).toBe('Invalid token');
  });

  it('authorizes a request once however often it is asked', async () => {
    const decode = jest.spyOn(jwtService, 'decode');
    const findById = jest.spyOn(usersRepository, 'findById');
    const request: AuthorizableRequest = { headers: { authorization: `Bearer ${token}` } };

    const first = await authorizer.authorizeRequest(request);
    const second = await authorizer.authorizeRequest(request);

    expect(second).toBe(first);
    expect(decode).toHaveBeenCalledTimes(1);
    expect(findById).toHaveBeenCalledTimes(1);
  });

  it('does not share outcomes between requests', async () => {
    const findById = jest.spyOn(usersRepository, 'findById');

    await authorizer.authorizeRequest({ headers: { authorization: `Bearer ${token}` } });
    await authorizer.authorizeRequest({ headers: { authorization: `Bearer ${token}` } });

    expect(findById).toHaveBeenCalledTimes(2);
  });
});
