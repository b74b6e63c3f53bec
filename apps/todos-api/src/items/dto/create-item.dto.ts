import { IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class CreateItemDto {
  @IsString({ message: "Name can't be blank" })
  @IsNotEmpty({ message: "Name can't be blank" })
  name!: string;

  @IsOptional()
  @IsBoolean({ message: 'Done must be true or false' })
  done?: boolean;
}
