import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from 'typeorm';

export const USERNAME_MAX_LENGTH = 150;

/**
 * Minimal identity row. Accounts are managed by the authentication
 * service; this table exists so tweets, photos and likes can hold
 * foreign keys to it.
 */
@Entity('users')
@Index(['username'], { unique: true })
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'username', type: 'varchar', length: USERNAME_MAX_LENGTH })
  username!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  toString(): string {
    return this.username;
  }
}
