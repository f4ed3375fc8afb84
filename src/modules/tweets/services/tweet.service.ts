import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Tweet } from '../entities/tweet.entity';
import { CreateTweetDto } from '../dto/create-tweet.dto';
import { UserService } from '../../accounts/services/user.service';
import { LikeService } from '../../likes/services/like.service';
import { Like } from '../../likes/entities/like.entity';
import { assertValid } from '../../../core/common/utils/validation.util';
import { translateStorageError } from '../../../core/common/exceptions/storage-error.util';

export const DEFAULT_USER_TWEETS_LIMIT = 20;

@Injectable()
export class TweetService {
  private readonly logger = new Logger(TweetService.name);

  constructor(
    @InjectRepository(Tweet)
    private readonly tweetRepository: Repository<Tweet>,
    private readonly userService: UserService,
    private readonly likeService: LikeService,
  ) {}

  async createTweet(input: CreateTweetDto): Promise<Tweet> {
    const dto = await assertValid(CreateTweetDto, input);
    const userId = dto.userId ?? null;

    const user = userId ? await this.userService.getUser(userId) : null;
    if (userId && !user) {
      throw new NotFoundException(`User ${userId} not found`);
    }

    try {
      const tweet = this.tweetRepository.create({
        userId,
        user,
        content: dto.content,
      });
      const saved = await this.tweetRepository.save(tweet);

      this.logger.log(
        `Created tweet ${saved.id} for ${userId ? `user ${userId}` : 'no user'}`,
      );
      return saved;
    } catch (error) {
      this.logger.error(`Failed to create tweet:`, error);
      throw translateStorageError(error);
    }
  }

  async getTweet(id: string): Promise<Tweet | null> {
    return this.tweetRepository.findOne({
      where: { id },
      relations: { user: true },
    });
  }

  /**
   * All tweets in the entity's default order: by author, then newest
   * first within each author.
   */
  async listTweets(limit?: number): Promise<Tweet[]> {
    return this.tweetRepository.find({
      relations: { user: true },
      take: limit,
    });
  }

  async listLatestByUser(
    userId: string,
    limit: number = DEFAULT_USER_TWEETS_LIMIT,
  ): Promise<Tweet[]> {
    const tweets = await this.tweetRepository.find({
      where: { userId },
      relations: { user: true },
      order: { createdAt: 'DESC' },
      take: limit,
    });

    if (tweets.length === 0) {
      this.logger.debug(`No tweets found for user ${userId}`);
    }

    return tweets;
  }

  /**
   * Likes of the tweet, most recent first.
   */
  async getLikes(tweet: Tweet): Promise<Like[]> {
    const { kind, id } = tweet.likeTarget;
    return this.likeService.likesFor(kind, id);
  }
}
