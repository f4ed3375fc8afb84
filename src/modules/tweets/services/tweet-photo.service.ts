import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { TweetPhoto } from '../entities/tweet-photo.entity';
import { TweetPhotoStatus } from '../entities/tweet-photo-status';
import { Tweet } from '../entities/tweet.entity';
import { CreateTweetPhotoDto } from '../dto/create-tweet-photo.dto';
import { ModerateTweetPhotoDto } from '../dto/moderate-tweet-photo.dto';
import { assertValid } from '../../../core/common/utils/validation.util';
import { utcNow } from '../../../core/common/utils/time.util';
import { translateStorageError } from '../../../core/common/exceptions/storage-error.util';

export const DEFAULT_MODERATION_QUEUE_LIMIT = 50;

export interface ListUserPhotosOptions {
  includeDeleted?: boolean;
}

@Injectable()
export class TweetPhotoService {
  private readonly logger = new Logger(TweetPhotoService.name);

  constructor(
    @InjectRepository(TweetPhoto)
    private readonly photoRepository: Repository<TweetPhoto>,
    @InjectRepository(Tweet)
    private readonly tweetRepository: Repository<Tweet>,
  ) {}

  /**
   * Attaches an uploaded file to a tweet. The uploader defaults to the
   * tweet's author.
   */
  async attachPhoto(input: CreateTweetPhotoDto): Promise<TweetPhoto> {
    const dto = await assertValid(CreateTweetPhotoDto, input);

    const tweet = await this.tweetRepository.findOne({
      where: { id: dto.tweetId },
    });
    if (!tweet) {
      throw new NotFoundException(`Tweet ${dto.tweetId} not found`);
    }

    try {
      const photo = this.photoRepository.create({
        tweetId: tweet.id,
        userId: dto.userId ?? tweet.userId,
        file: dto.file,
        order: dto.order ?? 0,
        status: TweetPhotoStatus.PENDING,
        hasDeleted: false,
        deletedAt: null,
      });
      const saved = await this.photoRepository.save(photo);

      this.logger.log(`Attached photo ${saved.id} to tweet ${tweet.id}`);
      return saved;
    } catch (error) {
      this.logger.error(
        `Failed to attach photo to tweet ${dto.tweetId}:`,
        error,
      );
      throw translateStorageError(error);
    }
  }

  /**
   * Any photo by id, soft-deleted ones included.
   */
  async getPhoto(id: string): Promise<TweetPhoto | null> {
    return this.photoRepository.findOne({ where: { id } });
  }

  /**
   * Visible photos of a tweet in display order.
   */
  async listPhotosForTweet(tweetId: string): Promise<TweetPhoto[]> {
    return this.photoRepository.find({
      where: { tweetId, hasDeleted: false },
      order: { order: 'ASC', createdAt: 'ASC' },
    });
  }

  async listPhotosByUser(
    userId: string,
    options: ListUserPhotosOptions = {},
  ): Promise<TweetPhoto[]> {
    const where: FindOptionsWhere<TweetPhoto> = { userId };
    if (!options.includeDeleted) {
      where.hasDeleted = false;
    }

    return this.photoRepository.find({
      where,
      order: { createdAt: 'DESC' },
    });
  }

  /**
   * Photos awaiting (or having received) a moderation decision, oldest
   * first.
   */
  async listModerationQueue(
    status: TweetPhotoStatus = TweetPhotoStatus.PENDING,
    limit: number = DEFAULT_MODERATION_QUEUE_LIMIT,
  ): Promise<TweetPhoto[]> {
    return this.photoRepository.find({
      where: { status, hasDeleted: false },
      order: { createdAt: 'ASC' },
      take: limit,
    });
  }

  /**
   * First phase of deletion: flags the photo and stamps `deletedAt`.
   * Physical removal happens later, outside this service.
   */
  async softDeletePhoto(id: string): Promise<TweetPhoto> {
    const photo = await this.requirePhoto(id);

    if (photo.hasDeleted) {
      this.logger.debug(
        `Photo ${id} already deleted at ${photo.deletedAt?.toISOString()}`,
      );
      return photo;
    }

    photo.markDeleted(utcNow());

    try {
      const saved = await this.photoRepository.save(photo);
      this.logger.log(`Soft-deleted photo ${id}`);
      return saved;
    } catch (error) {
      this.logger.error(`Failed to soft-delete photo ${id}:`, error);
      throw translateStorageError(error);
    }
  }

  /**
   * Records a moderation decision on a pending photo.
   */
  async moderatePhoto(
    id: string,
    status: TweetPhotoStatus,
  ): Promise<TweetPhoto> {
    const dto = await assertValid(ModerateTweetPhotoDto, { status });
    const photo = await this.requirePhoto(id);

    if (photo.hasDeleted) {
      throw new ConflictException(`Photo ${id} has been deleted`);
    }
    if (photo.status !== TweetPhotoStatus.PENDING) {
      throw new ConflictException(
        `Photo ${id} has already been moderated (status ${TweetPhotoStatus[photo.status]})`,
      );
    }

    photo.status = dto.status;

    try {
      const saved = await this.photoRepository.save(photo);
      this.logger.log(
        `Photo ${id} moderated as ${TweetPhotoStatus[dto.status]}`,
      );
      return saved;
    } catch (error) {
      this.logger.error(`Failed to moderate photo ${id}:`, error);
      throw translateStorageError(error);
    }
  }

  private async requirePhoto(id: string): Promise<TweetPhoto> {
    const photo = await this.photoRepository.findOne({ where: { id } });
    if (!photo) {
      throw new NotFoundException(`Photo ${id} not found`);
    }
    return photo;
  }
}
