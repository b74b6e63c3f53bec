import { PipeTransform } from '@nestjs/common';
import { ERRORS } from '@todos/common/errors';

/**
 * Route ids that are not positive integers cannot name a record: 404.
 */
export class ParseIdPipe implements PipeTransform<string, number> {
  constructor(private readonly resource: string) {}

  transform(value: string): number {
    if (!/^[1-9]\d*$/.test(value)) {
      throw ERRORS.NotFound(this.resource, value);
    }
    return Number(value);
  }
}
