import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { User } from '../../accounts/entities/user.entity';
import { LikeTarget, LikeTargetKind } from '../../likes/entities/like-target';
import { hoursBetween, utcNow } from '../../../core/common/utils/time.util';
import { TweetPhoto } from './tweet-photo.entity';

export const TWEET_CONTENT_MAX_LENGTH = 255;

/**
 * A post authored by a user.
 *
 * Unordered queries come back grouped by author, newest first within
 * each author. An explicit `order` on the query replaces this.
 */
@Entity('tweets', { orderBy: { userId: 'ASC', createdAt: 'DESC' } })
@Index(['userId', 'createdAt'])
export class Tweet {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'uuid', nullable: true })
  userId!: string | null;

  // Removing the author keeps the tweet and clears the reference
  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'user_id' })
  user?: User | null;

  @Column({
    name: 'content',
    type: 'varchar',
    length: TWEET_CONTENT_MAX_LENGTH,
  })
  content!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz', update: false })
  createdAt!: Date;

  @OneToMany(() => TweetPhoto, photo => photo.tweet)
  photos?: TweetPhoto[];

  /**
   * Whole hours since the tweet was posted.
   */
  hoursToNow(now: Date = utcNow()): number {
    return hoursBetween(this.createdAt, now);
  }

  /**
   * Reference under which likes of this tweet are stored.
   */
  get likeTarget(): LikeTarget {
    return { kind: LikeTargetKind.TWEET, id: this.id };
  }

  toString(): string {
    const author = this.user ? this.user.toString() : 'None';
    return `${this.createdAt.toISOString()} ${author}: ${this.content}`;
  }
}
