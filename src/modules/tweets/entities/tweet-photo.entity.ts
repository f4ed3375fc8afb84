import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Index,
  Check,
} from 'typeorm';
import { User } from '../../accounts/entities/user.entity';
import { utcNow } from '../../../core/common/utils/time.util';
import { Tweet } from './tweet.entity';
import {
  TweetPhotoStatus,
  TWEET_PHOTO_STATUS_VALUES,
} from './tweet-photo-status';

export const TWEET_PHOTO_FILE_MAX_LENGTH = 1024;

/**
 * A media attachment of a tweet.
 *
 * `userId` duplicates the owning tweet's author and backs per-uploader
 * queries (feeds, moderation bans) without a join through `tweets`.
 *
 * Deletion is two-phase: `markDeleted` flags the row now, a separate
 * sweeper removes flagged rows later.
 */
@Entity('tweet_photos')
@Index(['userId', 'createdAt'])
@Index(['hasDeleted', 'createdAt'])
@Index(['status', 'createdAt'])
@Index(['tweetId', 'order'])
@Check(
  'CHK_tweet_photos_deleted_at',
  `("has_deleted" = false AND "deleted_at" IS NULL) OR ("has_deleted" = true AND "deleted_at" IS NOT NULL)`,
)
@Check(
  'CHK_tweet_photos_status',
  `"status" IN (${TWEET_PHOTO_STATUS_VALUES.join(', ')})`,
)
export class TweetPhoto {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tweet_id', type: 'uuid', nullable: true })
  tweetId!: string | null;

  @ManyToOne(() => Tweet, tweet => tweet.photos, {
    nullable: true,
    onDelete: 'SET NULL',
  })
  @JoinColumn({ name: 'tweet_id' })
  tweet?: Tweet | null;

  @Column({ name: 'user_id', type: 'uuid', nullable: true })
  userId!: string | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'user_id' })
  user?: User | null;

  /** Storage key of the uploaded object. */
  @Column({ name: 'file', type: 'varchar', length: TWEET_PHOTO_FILE_MAX_LENGTH })
  file!: string;

  // Display position among the tweet's photos, not unique
  @Column({ name: 'order', type: 'integer', default: 0 })
  order!: number;

  @Column({
    name: 'status',
    type: 'smallint',
    default: TweetPhotoStatus.PENDING,
  })
  status!: TweetPhotoStatus;

  @Column({ name: 'has_deleted', type: 'boolean', default: false })
  hasDeleted!: boolean;

  @Column({ name: 'deleted_at', type: 'timestamptz', nullable: true })
  deletedAt!: Date | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz', update: false })
  createdAt!: Date;

  /**
   * Flags the photo as deleted. Both columns always change together.
   */
  markDeleted(at: Date = utcNow()): void {
    this.hasDeleted = true;
    this.deletedAt = at;
  }

  toString(): string {
    return `${this.tweetId ?? 'None'}: ${this.file}`;
  }
}
