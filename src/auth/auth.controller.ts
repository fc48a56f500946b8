import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from '@nestjs/common';
import { IResponse } from '../shared/interfaces';
import { AuthService } from './auth.service';
import { CurrentUser } from './decorators';
import { LoginDto, SignupDto } from './dto';
import { JwtAuthGuard } from './guards';
import { IAuthUser, ILoginResponse, IUserResponse } from './interfaces';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('signup')
  async signup(@Body() signupDto: SignupDto): Promise<IUserResponse> {
    return this.authService.signup(signupDto);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() loginDto: LoginDto): Promise<ILoginResponse> {
    return this.authService.login(loginDto);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtAuthGuard)
  async logout(@CurrentUser() user: IAuthUser): Promise<IResponse> {
    return this.authService.logout(user);
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  async getProfile(@CurrentUser() user: IAuthUser): Promise<IUserResponse> {
    return this.authService.getProfile(user);
  }
}
