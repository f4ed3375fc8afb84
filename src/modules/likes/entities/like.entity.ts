import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';
import { User } from '../../accounts/entities/user.entity';
import { LikeTarget, LikeTargetKind } from './like-target';

@Entity('likes')
@Index(['targetKind', 'targetId', 'createdAt'])
@Index(['userId', 'targetKind', 'targetId'], { unique: true })
export class Like {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({
    name: 'target_kind',
    type: 'enum',
    enum: LikeTargetKind,
  })
  targetKind!: LikeTargetKind;

  @Column({ name: 'target_id', type: 'uuid' })
  targetId!: string;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  // Likes are removed together with their author
  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: User;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  get target(): LikeTarget {
    return { kind: this.targetKind, id: this.targetId };
  }
}
