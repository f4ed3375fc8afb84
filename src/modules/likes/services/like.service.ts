import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Like } from '../entities/like.entity';
import { LikeTargetKind } from '../entities/like-target';

@Injectable()
export class LikeService {
  private readonly logger = new Logger(LikeService.name);

  constructor(
    @InjectRepository(Like)
    private readonly likeRepository: Repository<Like>,
  ) {}

  /**
   * Likes pointing at the given row, most recent first.
   */
  async likesFor(kind: LikeTargetKind, id: string): Promise<Like[]> {
    const likes = await this.likeRepository.find({
      where: { targetKind: kind, targetId: id },
      order: { createdAt: 'DESC' },
    });

    if (likes.length === 0) {
      this.logger.debug(`No likes found for ${kind} ${id}`);
    }

    return likes;
  }

  async countFor(kind: LikeTargetKind, id: string): Promise<number> {
    return this.likeRepository.count({
      where: { targetKind: kind, targetId: id },
    });
  }
}
