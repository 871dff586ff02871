import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

/** Rows are written once per hash and deleted only when their source text changes. */
@Entity({ name: 'embedding_cache' })
export class EmbeddingCacheRecord {
  @PrimaryColumn({ type: 'char', length: 64, name: 'content_hash' })
  contentHash!: string;

  @Column({ type: 'jsonb' })
  vector!: number[];

  @Index('IDX_embedding_cache_source_key')
  @Column({ type: 'varchar', length: 255, name: 'source_key', nullable: true })
  sourceKey!: string | null;

  @Column({ type: 'varchar', length: 120 })
  model!: string;

  @Column({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;
}
