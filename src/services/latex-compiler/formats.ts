import type { ExportFormat } from '@/lib/validations/resume';

export interface FormatSpec {
  contentType: string;
  filename: string;
  extension: string;
  /** Leading bytes every valid artifact starts with; null for text formats */
  signature: readonly number[] | null;
}

export const FORMAT_TABLE: Readonly<Record<ExportFormat, FormatSpec>> = {
  LATEX: { contentType: 'application/x-latex', filename: 'resume.tex', extension: 'tex', signature: null },
  PDF: { contentType: 'application/pdf', filename: 'resume.pdf', extension: 'pdf', signature: [0x25, 0x50, 0x44, 0x46] },
  PNG: {
    contentType: 'image/png',
    filename: 'resume.png',
    extension: 'png',
    signature: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
  },
  JPG: { contentType: 'image/jpeg', filename: 'resume.jpg', extension: 'jpg', signature: [0xff, 0xd8, 0xff] },
};

export type BinaryFormat = Exclude<ExportFormat, 'LATEX'>;
export type ImageFormat = Exclude<BinaryFormat, 'PDF'>;

/**
 * True when the payload is non-empty and starts with the format's magic
 * number
 */
export function hasSignature(bytes: Uint8Array, format: BinaryFormat): boolean {
  const signature = FORMAT_TABLE[format].signature ?? [];
  if (bytes.length <= signature.length) return false;
  return signature.every((byte, index) => bytes[index] === byte);
}
