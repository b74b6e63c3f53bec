/**
 * Login DTO
 * Fields are optional so that any bad pair ends as "Invalid credentials"
 */

import { IsOptional, IsString } from 'class-validator';

export class LoginDto {
  @IsOptional()
  @IsString()
  email?: string;

  @IsOptional()
  @IsString()
  password?: string;
}

export interface LoginResponseDto {
  auth_token: string;
}
