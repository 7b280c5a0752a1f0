import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import type { DocumentRole, DocumentState, FailureRecord, Signer, StepClaim } from '../domain/document';

@Entity('contract_documents')
@Index(['state', 'updatedAt'])
@Index(['envelopeId'])
@Index(['role'])
export class ContractDocumentEntity {
  @PrimaryColumn('uuid', { name: 'document_id' })
  documentId!: string;

  @Column({ name: 'role', type: 'text' })
  role!: DocumentRole;

  @Column({ name: 'template_id', type: 'text' })
  templateId!: string;

  @Column({ name: 'inputs', type: 'jsonb' })
  inputs!: Record<string, string>;

  @Column({ name: 'signers', type: 'jsonb' })
  signers!: Signer[];

  @Column({ name: 'content', type: 'text', nullable: true })
  content!: string | null;

  @Column({ name: 'rendered_blob_ref', type: 'text', nullable: true })
  renderedBlobRef!: string | null;

  @Column({ name: 'envelope_id', type: 'text', nullable: true })
  envelopeId!: string | null;

  @Column({ name: 'state', type: 'text', default: 'REQUESTED' })
  state!: DocumentState;

  @Column({ name: 'failure', type: 'jsonb', nullable: true })
  failure!: FailureRecord | null;

  @Column({ name: 'claim', type: 'jsonb', nullable: true })
  claim!: StepClaim | null;

  @Column({ name: 'metadata', type: 'jsonb', default: () => "'{}'::jsonb" })
  metadata!: Record<string, string>;

  @Column({ name: 'version', type: 'int', default: 1 })
  version!: number;

  @Column({ name: 'created_at', type: 'timestamptz', default: () => 'NOW()' })
  createdAt!: Date;

  @Column({ name: 'updated_at', type: 'timestamptz', default: () => 'NOW()' })
  updatedAt!: Date;
}
