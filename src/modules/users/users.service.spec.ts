import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { NotFoundException } from '@nestjs/common';
import { UsersService } from './users.service';
import { User } from './user.entity';
import { ClockService } from '../../common/clock/clock.service';
import { createMockRepo } from '@/test-utils/mock-repo';
import { fakeUser } from '@/test-utils/fixtures';

describe('UsersService', () => {
  let service: UsersService;
  const userRepo = createMockRepo<User>();

  beforeEach(async () => {
    userRepo.findOne.mockReset();
    userRepo.find.mockReset();
    userRepo.create.mockReset();
    userRepo.save.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UsersService,
        { provide: getRepositoryToken(User), useValue: userRepo },
        { provide: ClockService, useValue: { today: () => '2024-02-01' } },
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
  });

  it('normalizes email before lookup', async () => {
    userRepo.findOne.mockResolvedValue(null);

    await service.findByEmail('  Alice@Example.COM ');

    expect(userRepo.findOne).toHaveBeenCalledWith({
      where: { email: 'alice@example.com' },
    });
  });

  it('creates a non-admin user joined today', async () => {
    userRepo.create.mockImplementation((input: Partial<User>) => input);
    userRepo.save.mockImplementation(async (input: Partial<User>) => ({
      id: 'u1',
      ...input,
    }));

    const created = await service.create({
      name: ' alice ',
      email: 'Alice@Example.com',
      passwordHash: 'hashed',
    });

    expect(userRepo.create).toHaveBeenCalledWith({
      name: 'alice',
      email: 'alice@example.com',
      passwordHash: 'hashed',
      admin: false,
      joinDate: '2024-02-01',
    });
    expect(created.id).toBe('u1');
  });

  it('returns the public profile', async () => {
    userRepo.findOne.mockResolvedValue(
      fakeUser({ id: 'u1', name: 'alice', joinDate: '2023-05-04' }),
    );

    await expect(service.getProfile('u1')).resolves.toEqual({
      id: 'u1',
      name: 'alice',
      admin: false,
      joinDate: '2023-05-04',
    });
  });

  it('throws USER_NOT_FOUND for an unknown id', async () => {
    userRepo.findOne.mockResolvedValue(null);

    const err = await service.getProfile('missing').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundException);
    expect(err).toMatchObject({ response: { code: 'USER_NOT_FOUND' } });
  });
});
