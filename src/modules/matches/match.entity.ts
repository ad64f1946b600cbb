import {
  Check,
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Stage } from '../events/stage.entity';
import { Participant } from '../events/participant.entity';

@Entity('matches')
@Check('CHK_matches_distinct_participants', '"participant1Id" <> "participant2Id"')
@Index(['participant1Id'])
@Index(['participant2Id'])
export class Match {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  stageId!: string;

  @ManyToOne(() => Stage, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'stageId' })
  stage!: Stage;

  @Column({ type: 'uuid' })
  participant1Id!: string;

  @ManyToOne(() => Participant, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'participant1Id' })
  participant1!: Participant;

  @Column({ type: 'uuid' })
  participant2Id!: string;

  @ManyToOne(() => Participant, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'participant2Id' })
  participant2!: Participant;

  // Null while the match is unplayed; always one of the two participants.
  @Column({ type: 'uuid', nullable: true })
  winnerId!: string | null;

  @Column({ type: 'uuid', nullable: true })
  loserId!: string | null;

  @Column({ type: 'int', nullable: true })
  p1Wins!: number | null;

  @Column({ type: 'int', nullable: true })
  p2Wins!: number | null;

  @Column({ type: 'int', nullable: true })
  draws!: number | null;

  @Column({ type: 'timestamptz', nullable: true })
  recordedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;
}
