export * from './auth.types';
export * from './todo.types';
