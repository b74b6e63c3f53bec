/**
 * Signup DTO
 */

import { IsEmail, IsNotEmpty, IsString } from 'class-validator';

export class SignupDto {
  @IsString({ message: "Name can't be blank" })
  @IsNotEmpty({ message: "Name can't be blank" })
  name!: string;

  @IsEmail({}, { message: 'Email is invalid' })
  email!: string;

  @IsString({ message: "Password can't be blank" })
  @IsNotEmpty({ message: "Password can't be blank" })
  password!: string;

  @IsString({ message: "Password confirmation can't be blank" })
  password_confirmation!: string;
}

export interface SignupResponseDto {
  message: string;
  auth_token: string;
}
