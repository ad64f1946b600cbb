import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { User } from '../users/user.entity';
import { TournamentEvent } from './event.entity';

@Entity('participants')
@Index(['eventId', 'userId'], { unique: true })
@Index(['userId'])
export class Participant {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  eventId!: string;

  @ManyToOne(() => TournamentEvent, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'eventId' })
  event!: TournamentEvent;

  @Column({ type: 'uuid' })
  userId!: string;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;

  @CreateDateColumn()
  enrolledAt!: Date;
}
