export type LiteralPiece = {
  type: 'literal';
  value: string;
};

// Index into the arguments of the message that owns the piece
export type PlaceholderPiece = {
  type: 'placeholder';
  index: number;
};

export type SubMessageSelector = 'plural' | 'gender' | 'select';

export type SubMessageClause = {
  key: string;
  pieces: Piece[];
};

export type SubMessagePiece = {
  type: 'sub-message';
  selector: SubMessageSelector;
  argument: string;
  clauses: SubMessageClause[];
};

export type Piece = LiteralPiece | PlaceholderPiece | SubMessagePiece;

export type SourceLocation = {
  file: string;
  line: number;
};

export interface Message {
  id: string;
  pieces: Piece[];
  arguments: string[];
  description?: string;
  examples?: Record<string, string[]>;
  meaning?: string;
  location?: SourceLocation;
}

export interface InterchangeRecord {
  translation: string;
  context?: string;
  notes?: string;
}

// Raw translated file contents; values are validated on reconstruction
export type InterchangeDocument = Record<string, unknown>;

export type ExtractionWarning = {
  file: string;
  line: number;
  message: string;
};
