import { IsNotEmpty, IsString } from 'class-validator';

export class CreateTodoDto {
  @IsString({ message: "Title can't be blank" })
  @IsNotEmpty({ message: "Title can't be blank" })
  title!: string;
}
