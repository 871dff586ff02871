import { Column, Entity, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';

import type { BehaviorLevel, DiagnosticCategory, LearningChannel } from '../../core/@types';
import { BEHAVIOR_LEVELS, DIAGNOSTIC_CATEGORIES, LEARNING_CHANNELS } from '../../core/roster/categories';
import { Classroom } from './Classroom';

@Entity({ name: 'learners' })
export class Learner {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 120 })
  name!: string;

  @Column({
    type: 'enum',
    enum: DIAGNOSTIC_CATEGORIES,
    enumName: 'learners_diagnostic_category_enum',
    name: 'diagnostic_category',
    default: 'typical',
  })
  diagnosticCategory!: DiagnosticCategory;

  @Column({ type: 'jsonb', default: () => "'{}'::jsonb" })
  competencies!: Record<string, number>;

  @Column({
    type: 'enum',
    enum: LEARNING_CHANNELS,
    enumName: 'learners_channel_enum',
    name: 'preferred_channel',
    default: 'multisensory',
  })
  preferredChannel!: LearningChannel;

  @Column({
    type: 'enum',
    enum: BEHAVIOR_LEVELS,
    enumName: 'behavior_level_enum',
    name: 'activity_level',
    default: 'medium',
  })
  activityLevel!: BehaviorLevel;

  @Column({
    type: 'enum',
    enum: BEHAVIOR_LEVELS,
    enumName: 'behavior_level_enum',
    name: 'frustration_tolerance',
    default: 'medium',
  })
  frustrationTolerance!: BehaviorLevel;

  @ManyToOne(() => Classroom, (classroom) => classroom.learners, {
    nullable: true,
    onDelete: 'SET NULL',
  })
  @JoinColumn({ name: 'classroom_id' })
  classroom!: Classroom | null;
}
