/**
 * Text chunking: paragraphs, then sentences, then hard splits, packed up to a
 * size limit with a trailing overlap between neighbouring chunks
 */

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

interface Piece {
  text: string;
  /** Joiner placed before this piece when it follows another in a chunk */
  separator: string;
}

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

function splitPieces(text: string, chunkSize: number): Piece[] {
  const pieces: Piece[] = [];
  const paragraphs = text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);

  for (const paragraph of paragraphs) {
    if (paragraph.length <= chunkSize) {
      pieces.push({ text: paragraph, separator: '\n\n' });
      continue;
    }

    const sentences = paragraph.split(SENTENCE_BOUNDARY).filter(Boolean);
    sentences.forEach((sentence, index) => {
      const separator = index === 0 ? '\n\n' : ' ';
      if (sentence.length <= chunkSize) {
        pieces.push({ text: sentence, separator });
        return;
      }
      for (let start = 0; start < sentence.length; start += chunkSize) {
        pieces.push({ text: sentence.slice(start, start + chunkSize), separator: start === 0 ? separator : '' });
      }
    });
  }

  return pieces;
}

function measure(pieces: readonly Piece[]): number {
  return pieces.reduce((total, piece, index) => total + (index === 0 ? 0 : piece.separator.length) + piece.text.length, 0);
}

function render(pieces: readonly Piece[]): string {
  return pieces.map((piece, index) => (index === 0 ? '' : piece.separator) + piece.text).join('');
}

/**
 * Split text into chunks of at most `chunkSize` characters
 */
export function chunkText(text: string, options: ChunkOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  if (chunkSize < 1) {
    throw new Error(`chunkSize must be positive, got ${chunkSize}`);
  }
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new Error(`chunkOverlap must be within [0, chunkSize), got ${chunkOverlap}`);
  }

  const chunks: string[] = [];
  let current: Piece[] = [];

  for (const piece of splitPieces(text, chunkSize)) {
    if (current.length > 0 && measure([...current, piece]) > chunkSize) {
      chunks.push(render(current));

      const overlap: Piece[] = [];
      for (let i = current.length - 1; i >= 0; i--) {
        const candidate = current[i];
        if (!candidate || measure([candidate, ...overlap]) > chunkOverlap) break;
        overlap.unshift(candidate);
      }

      current = overlap;
      while (current.length > 0 && measure([...current, piece]) > chunkSize) {
        current.shift();
      }
    }
    current.push(piece);
  }

  if (current.length > 0) {
    chunks.push(render(current));
  }

  return chunks;
}
