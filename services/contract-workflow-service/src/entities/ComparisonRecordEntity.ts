import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

@Entity('comparison_records')
@Index(['kind'])
export class ComparisonRecordEntity {
  @PrimaryColumn('text', { name: 'record_id' })
  recordId!: string;

  @Column({ name: 'kind', type: 'text' })
  kind!: 'document' | 'plan';

  @Column({ name: 'vector', type: 'jsonb' })
  vector!: number[];

  @Column({ name: 'metadata', type: 'jsonb' })
  metadata!: Record<string, string>;

  @Column({ name: 'updated_at', type: 'timestamptz', default: () => 'NOW()' })
  updatedAt!: Date;
}
