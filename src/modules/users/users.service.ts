import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from './user.entity';
import { ClockService } from '../../common/clock/clock.service';

export interface UserView {
  id: string;
  name: string;
}

export interface UserProfileView extends UserView {
  admin: boolean;
  joinDate: string;
}

export function toUserView(user: Pick<User, 'id' | 'name'>): UserView {
  return { id: user.id, name: user.name };
}

@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(User) private readonly repo: Repository<User>,
    private readonly clock: ClockService,
  ) {}

  findByEmail(email: string): Promise<User | null> {
    return this.repo.findOne({ where: { email: email.toLowerCase().trim() } });
  }

  findByName(name: string): Promise<User | null> {
    return this.repo.findOne({ where: { name: name.trim() } });
  }

  findById(id: string): Promise<User | null> {
    return this.repo.findOne({ where: { id } });
  }

  async getByIdOrThrow(id: string): Promise<User> {
    const user = await this.findById(id);
    if (!user) {
      throw new NotFoundException({
        statusCode: 404,
        code: 'USER_NOT_FOUND',
        message: 'User not found',
      });
    }
    return user;
  }

  create(input: {
    name: string;
    email: string;
    passwordHash: string;
  }): Promise<User> {
    const user = this.repo.create({
      name: input.name.trim(),
      email: input.email.toLowerCase().trim(),
      passwordHash: input.passwordHash,
      admin: false,
      joinDate: this.clock.today(),
    });
    return this.repo.save(user);
  }

  async getProfile(id: string): Promise<UserProfileView> {
    const user = await this.getByIdOrThrow(id);
    return {
      id: user.id,
      name: user.name,
      admin: user.admin,
      joinDate: user.joinDate,
    };
  }
}
