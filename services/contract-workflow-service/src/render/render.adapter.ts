import { createHash } from 'crypto';
import { Inject, Injectable } from '@nestjs/common';
import PDFDocument from 'pdfkit';
import { RenderError, toError } from '@contractflow/shared';
import { DocumentRole, Signer } from '../domain/document';
import { ContractTemplate } from '../templates/contract-templates';
import { TemplateCatalog } from '../templates/template-catalog';
import { BLOB_STORE, BlobStore } from './blob-store';

// Fixed so identical inputs produce identical bytes.
const EPOCH = new Date('2000-01-01T00:00:00Z');

interface Block {
  kind: 'heading' | 'paragraph';
  text: string;
}

export interface RenderRequest {
  content: string;
  templateId: string;
  role: DocumentRole;
  metadata: Record<string, string>;
  signers: Signer[];
}

export type LayoutItem =
  | Block
  | { kind: 'title'; text: string }
  | { kind: 'field'; label: string; value: string }
  | { kind: 'signature'; label: string; signer: Signer };

export function parseBlocks(content: string): Block[] {
  const blocks: Block[] = [];
  let paragraph: string[] = [];

  const flush = () => {
    if (paragraph.length > 0) {
      blocks.push({ kind: 'paragraph', text: paragraph.join(' ') });
      paragraph = [];
    }
  };

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    const heading = line.match(/^#{1,6}\s+(.*)$/);
    if (heading) {
      flush();
      blocks.push({ kind: 'heading', text: heading[1] });
    } else if (line.length === 0) {
      flush();
    } else {
      paragraph.push(line);
    }
  }
  flush();
  return blocks;
}

/**
 * Everything that ends up on the page, in order: title, the document's
 * role and metadata, the content, then a signature block per signer.
 */
export function layoutContract(request: RenderRequest, template: ContractTemplate): LayoutItem[] {
  const metadata = Object.keys(request.metadata)
    .sort()
    .map((key): LayoutItem => ({ kind: 'field', label: key, value: request.metadata[key] }));

  return [
    { kind: 'title', text: template.title },
    { kind: 'field', label: 'Prepared for', value: request.role },
    { kind: 'field', label: 'Document type', value: template.documentType },
    ...metadata,
    ...parseBlocks(request.content),
    ...request.signers.map((signer): LayoutItem => ({ kind: 'signature', label: template.signatureLabel, signer })),
  ];
}

export function renderContractPdf(request: RenderRequest, template: ContractTemplate): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const doc = new PDFDocument({
      size: 'LETTER',
      margins: { top: 72, bottom: 72, left: 72, right: 72 },
      info: {
        Title: template.title,
        Subject: template.documentType,
        Creator: 'contract-workflow-service',
        CreationDate: EPOCH,
      },
    });

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    let body = false;
    for (const item of layoutContract(request, template)) {
      switch (item.kind) {
        case 'title':
          doc.fontSize(20).font('Helvetica-Bold').text(item.text, { align: 'center' });
          doc.moveDown();
          break;
        case 'field':
          doc.fontSize(10).font('Helvetica-Bold').text(`${item.label}: `, { continued: true });
          doc.font('Helvetica').text(item.value);
          break;
        case 'heading':
          if (!body) doc.moveDown();
          body = true;
          doc.moveDown(0.5).fontSize(13).font('Helvetica-Bold').text(item.text);
          doc.moveDown(0.5);
          break;
        case 'paragraph':
          if (!body) doc.moveDown();
          body = true;
          doc.fontSize(11).font('Helvetica').text(item.text, { align: 'justify', lineGap: 2 });
          doc.moveDown(0.5);
          break;
        case 'signature':
          doc.moveDown(1.5);
          doc.fontSize(12).font('Helvetica-Bold').text(`${item.label} Signature: __________________________`);
          doc.fontSize(10).font('Helvetica').text(`${item.signer.name} <${item.signer.email}>`);
          doc.text('Date: __________________________');
          break;
      }
    }

    doc.end();
  });
}

@Injectable()
export class RenderAdapter {
  constructor(
    private readonly catalog: TemplateCatalog,
    @Inject(BLOB_STORE) private readonly blobs: BlobStore
  ) {}

  /** Blob name derived from everything rendered, so a repeat render reuses the stored file. */
  blobName(request: RenderRequest): string {
    const hash = createHash('sha256').update(request.templateId).update('\0').update(request.role).update('\0');
    for (const key of Object.keys(request.metadata).sort()) {
      hash.update(`${key}=${request.metadata[key]}`).update('\0');
    }
    for (const signer of request.signers) {
      hash.update(`${signer.name} <${signer.email}>`).update('\0');
    }
    return `${hash.update(request.content).digest('hex')}.pdf`;
  }

  async render(request: RenderRequest): Promise<string> {
    if (request.content.trim().length === 0) {
      throw new RenderError('Cannot render empty content');
    }
    const template = this.catalog.get(request.templateId);

    const name = this.blobName(request);
    const existing = await this.blobs.locate(name);
    if (existing) {
      return existing;
    }

    let bytes: Buffer;
    try {
      bytes = await renderContractPdf(request, template);
    } catch (err) {
      const error = toError(err);
      throw new RenderError(`PDF rendering failed: ${error.message}`, error);
    }
    return this.blobs.put(name, bytes);
  }
}
