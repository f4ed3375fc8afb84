import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '../entities/user.entity';

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
  ) {}

  async getUser(id: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  /**
   * Deletes the user row. The database clears `user_id` on their tweets
   * and photos and removes their likes.
   */
  async removeUser(id: string): Promise<void> {
    try {
      const result = await this.userRepository.delete({ id });
      if (!result.affected) {
        throw new NotFoundException(`User ${id} not found`);
      }
      this.logger.log(`Removed user ${id}`);
    } catch (error) {
      if (!(error instanceof NotFoundException)) {
        this.logger.error(`Failed to remove user ${id}:`, error);
      }
      throw error;
    }
  }
}
