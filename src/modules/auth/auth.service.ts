import {
  ConflictException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { UsersService } from '../users/users.service';
import { User } from '../users/user.entity';
import { JwtPayload } from './auth.types';
import { isUniqueViolation } from '../../common/errors/pg-error';

const BCRYPT_ROUNDS = 10;

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly users: UsersService,
    private readonly jwt: JwtService,
  ) {}

  async register(input: { name: string; email: string; password: string }) {
    const email = input.email.toLowerCase().trim();

    const [byEmail, byName] = await Promise.all([
      this.users.findByEmail(email),
      this.users.findByName(input.name),
    ]);
    if (byEmail || byName) {
      throw this.userExists(
        byEmail ? 'Email already in use' : 'Name already in use',
      );
    }

    const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);
    let user: User;
    try {
      user = await this.users.create({
        name: input.name,
        email,
        passwordHash,
      });
    } catch (e: unknown) {
      // lost a race against another registration with the same name or email
      if (isUniqueViolation(e)) {
        throw this.userExists('Name or email already in use');
      }
      throw e;
    }
    this.logger.log(`registered user ${user.id}`);

    return this.issueToken(user);
  }

  async login(input: { email: string; password: string }) {
    const user = await this.users.findByEmail(input.email);
    if (!user || !(await this.checkPassword(user, input.password))) {
      throw new UnauthorizedException('Invalid credentials');
    }

    return this.issueToken(user);
  }

  checkPassword(user: Pick<User, 'passwordHash'>, plain: string): Promise<boolean> {
    return bcrypt.compare(plain, user.passwordHash);
  }

  private userExists(message: string) {
    return new ConflictException({
      statusCode: 409,
      code: 'USER_EXISTS',
      message,
    });
  }

  private issueToken(user: Pick<User, 'id' | 'email'>) {
    const payload: JwtPayload = { sub: user.id, email: user.email };
    return { accessToken: this.jwt.sign(payload) };
  }
}
