/**
 * Auth Controller
 * Signup and login; the only routes without AuthGuard
 */

import { Controller, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { orThrow } from '@todos/common/errors';
import { AuthService } from './auth.service';
import { LoginDto, LoginResponseDto } from './dto/login.dto';
import { SignupDto, SignupResponseDto } from './dto/signup.dto';

export const ACCOUNT_CREATED = 'Account created successfully';

@Controller()
export class AuthController {
  constructor(private authService: AuthService) {}

  /**
   * POST /signup
   */
  @Post('signup')
  @HttpCode(HttpStatus.CREATED)
  async signup(@Body() dto: SignupDto): Promise<SignupResponseDto> {
    const { authToken } = orThrow(
      await this.authService.signup({
        name: dto.name,
        email: dto.email,
        password: dto.password,
        passwordConfirmation: dto.password_confirmation,
      }),
    );
    return { message: ACCOUNT_CREATED, auth_token: authToken };
  }

  /**
   * POST /auth/login
   */
  @Post('auth/login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<LoginResponseDto> {
    const authToken = orThrow(
      await this.authService.login(dto.email ?? '', dto.password ?? ''),
    );
    return { auth_token: authToken };
  }
}
