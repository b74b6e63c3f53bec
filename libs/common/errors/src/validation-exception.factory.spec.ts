import { ValidationError } from 'class-validator';
import { ErrorCode } from './error-codes';
import { validationExceptionFactory } from './validation-exception.factory';

function violation(
  property: string,
  constraints: Record<string, string>,
  children: ValidationError[] = [],
): ValidationError {
  const error = new ValidationError();
  error.property = property;
  error.constraints = constraints;
  error.children = children;
  return error;
}

describe('validationExceptionFactory', () => {
  it('produces a ValidationError listing every constraint message once', () => {
    const error = validationExceptionFactory([
      violation('title', {
        isString: "Title can't be blank",
        isNotEmpty: "Title can't be blank",
      }),
      violation('page', { min: 'Page must be greater than or equal to 1' }),
    ]);

    expect(error.code).toBe(ErrorCode.ValidationError);
    expect(error.httpStatusCode).toBe(422);
    expect(error.message).toBe(
      "Validation failed: Title can't be blank, Page must be greater than or equal to 1",
    );
  });

  it('names properties the DTO does not declare', () => {
    const error = validationExceptionFactory([
      violation('sort', { whitelistValidation: 'property sort should not exist' }),
      violation('title', { isNotEmpty: "Title can't be blank" }),
    ]);

    expect(error.message).toBe(
      "Validation failed: Unpermitted parameter: sort, Title can't be blank",
    );
  });

  it('includes messages of nested properties', () => {
    const error = validationExceptionFactory([
      violation('item', {}, [violation('name', { isNotEmpty: "Name can't be blank" })]),
    ]);

    expect(error.message).toBe("Validation failed: Name can't be blank");
  });
});
