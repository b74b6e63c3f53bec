import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class UpdateTodoDto {
  @IsOptional()
  @IsString({ message: "Title can't be blank" })
  @IsNotEmpty({ message: "Title can't be blank" })
  title?: string;
}
