import {
  Check,
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { TournamentEvent } from './event.entity';

@Entity('stages')
@Check('CHK_stages_date_range', '"startDate" <= "endDate"')
export class Stage {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  eventId!: string;

  @ManyToOne(() => TournamentEvent, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'eventId' })
  event!: TournamentEvent;

  @Column({ type: 'date' })
  startDate!: string;

  @Column({ type: 'date' })
  endDate!: string;
}
