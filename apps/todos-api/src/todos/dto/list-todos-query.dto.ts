import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { MAX_PAGE } from '../pagination';

export class ListTodosQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'Page must be an integer' })
  @Min(1, { message: 'Page must be greater than or equal to 1' })
  @Max(MAX_PAGE, { message: `Page must be less than or equal to ${MAX_PAGE}` })
  page?: number;
}

export interface TodosPageResponseDto<T> {
  todos: T[];
  page: number;
  per_page: number;
}
