import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { UserService } from './user.service';
import { User } from '../entities/user.entity';
import { InMemoryRepository } from '../../../testing/in-memory-repository';

describe('UserService', () => {
  let service: UserService;
  let userRepository: InMemoryRepository<User>;

  beforeEach(async () => {
    userRepository = new InMemoryRepository(User, {
      defaults: () => ({ createdAt: new Date() }),
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UserService,
        {
          provide: getRepositoryToken(User),
          useValue: userRepository,
        },
      ],
    }).compile();

    service = module.get<UserService>(UserService);
  });

  it('should find a stored user by id', async () => {
    const alice = await userRepository.save(
      userRepository.create({ username: 'alice' }),
    );

    const found = await service.getUser(alice.id);

    expect(found?.username).toBe('alice');
    expect(String(found)).toBe('alice');
  });

  it('should return null for an unknown id', async () => {
    await expect(
      service.getUser('3b241101-e2bb-4255-8caf-4136c566a962'),
    ).resolves.toBeNull();
  });

  it('should remove a user', async () => {
    const alice = await userRepository.save(
      userRepository.create({ username: 'alice' }),
    );

    await service.removeUser(alice.id);

    expect(userRepository.rows).toHaveLength(0);
  });

  it('should throw NotFoundException when removing an unknown user', async () => {
    await expect(
      service.removeUser('3b241101-e2bb-4255-8caf-4136c566a962'),
    ).rejects.toThrow(NotFoundException);
  });
});
