export enum ErrorCode {
  // Token errors
  MissingToken = 'MissingToken',
  InvalidToken = 'InvalidToken',
  ExpiredToken = 'ExpiredToken',

  // Credential errors
  AuthenticationError = 'AuthenticationError',

  // Domain errors
  ValidationError = 'ValidationError',
  NotFound = 'NotFound',

  // General errors
  InternalError = 'InternalError',
}
