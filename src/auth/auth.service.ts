import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CartService } from '../cart/cart.service';
import { MIN_PASSWORD_LENGTH } from '../constants';
import { IResponse } from '../shared/interfaces';
import { errorMessage, isUniqueViolation } from '../shared/helpers';
import { LoginDto, SignupDto } from './dto';
import { User } from './entities';
import { Role } from './enums';
import { hashPassword, toPublicUser, verifyPassword } from './helpers';
import {
  IAuthUser,
  IJwtPayload,
  ILoginResponse,
  IUserResponse,
} from './interfaces';

@Injectable()
export class AuthService {
  private readonly logger = new Logger('AuthService');

  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    private jwtService: JwtService,
    private cartService: CartService,
  ) {}

  async signup(signupDto: SignupDto): Promise<IUserResponse> {
    try {
      const username = signupDto.username?.trim() ?? '';
      const { password = '', confirmPassword = '' } = signupDto;

      if (!username || !password || !confirmPassword) {
        return {
          status: HttpStatus.BAD_REQUEST,
          message: 'Please fill in all fields',
          user: null,
        };
      }
      if (password !== confirmPassword) {
        return {
          status: HttpStatus.BAD_REQUEST,
          message: 'Passwords do not match',
          user: null,
        };
      }
      if (await this.userRepository.existsBy({ username })) {
        return {
          status: HttpStatus.CONFLICT,
          message: 'Username already exists',
          user: null,
        };
      }
      if (password.length < MIN_PASSWORD_LENGTH) {
        return {
          status: HttpStatus.BAD_REQUEST,
          message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters`,
          user: null,
        };
      }

      const user = this.userRepository.create({
        username,
        passwordHash: await hashPassword(password),
        role: Role.USER,
      });
      await this.userRepository.save(user);
      this.logger.log(user.id, 'user registered');

      return {
        status: HttpStatus.CREATED,
        message: 'User registered successfully! Please log in.',
        user: toPublicUser(user),
      };
    } catch (error) {
      if (isUniqueViolation(error)) {
        return {
          status: HttpStatus.CONFLICT,
          message: 'Username already exists',
          user: null,
        };
      }
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        user: null,
      };
    }
  }

  async login(loginDto: LoginDto): Promise<ILoginResponse> {
    try {
      const { username = '', password = '' } = loginDto;
      if (!username || !password) {
        return {
          status: HttpStatus.BAD_REQUEST,
          message: 'Please fill in all fields',
          accessToken: null,
          user: null,
        };
      }

      const user = await this.userRepository.findOneBy({ username });
      if (!user || !(await verifyPassword(password, user.passwordHash))) {
        return {
          status: HttpStatus.UNAUTHORIZED,
          message: 'Invalid username or password',
          accessToken: null,
          user: null,
        };
      }

      const payload: IJwtPayload = {
        sub: user.id,
        username: user.username,
        role: user.role,
      };
      return {
        status: HttpStatus.OK,
        message: 'Logged in successfully',
        accessToken: await this.jwtService.signAsync(payload),
        user: toPublicUser(user),
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        accessToken: null,
        user: null,
      };
    }
  }

  //! Tokens are stateless: logging out only resets the cart
  async logout(authUser: IAuthUser): Promise<IResponse> {
    const { status, message } = await this.cartService.clearCart(authUser.id);
    if (status !== HttpStatus.OK) {
      return { status, message };
    }
    return { status: HttpStatus.OK, message: 'Logged out successfully' };
  }

  async getProfile(authUser: IAuthUser): Promise<IUserResponse> {
    try {
      const user = await this.userRepository.findOneBy({ id: authUser.id });
      if (!user) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'User not found',
          user: null,
        };
      }
      return {
        status: HttpStatus.OK,
        message: 'User fetched successfully',
        user: toPublicUser(user),
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        user: null,
      };
    }
  }
}
