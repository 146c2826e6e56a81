import { InvalidTransitionError, type PipelineError } from "../errors";
import type { Logger } from "../logger";
import type { Chunk } from "../document/fragmenter";
import type { DocumentMetadata, SegmentedDocument } from "../document/segmenter";

export type DocumentState =
  | { status: "pending" }
  | { status: "fetched"; rawHtml: string }
  | { status: "segmented"; document: SegmentedDocument }
  | { status: "fragmented"; document: SegmentedDocument; chunks: Chunk[] }
  | {
      status: "translating";
      document: SegmentedDocument;
      chunks: Chunk[];
      /** Units (chunks plus the metadata unit) that have settled so far */
      settled: number;
      total: number;
    }
  | {
      status: "translated";
      document: SegmentedDocument;
      chunks: Chunk[];
      metadata: DocumentMetadata | null;
    }
  | { status: "reassembled"; html: string }
  | { status: "persisted"; outputPath: string }
  | { status: "failed"; failedIn: DocumentStatus; error: PipelineError };

export type DocumentStatus = DocumentState["status"];

const TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  pending: ["fetched", "failed"],
  fetched: ["segmented", "failed"],
  segmented: ["fragmented", "failed"],
  fragmented: ["translating", "failed"],
  translating: ["translating", "translated", "failed"],
  translated: ["reassembled", "failed"],
  reassembled: ["persisted", "failed"],
  persisted: [],
  failed: [],
};

export const canTransition = (from: DocumentStatus, to: DocumentStatus): boolean =>
  TRANSITIONS[from].includes(to);

export const isTerminal = (status: DocumentStatus): boolean => TRANSITIONS[status].length === 0;

export const transition = (current: DocumentState, next: DocumentState): DocumentState => {
  if (!canTransition(current.status, next.status)) {
    throw new InvalidTransitionError(current.status, next.status);
  }
  return next;
};

/** Tracks one document through the pipeline and logs each stage change. */
export class DocumentStateMachine {
  private current: DocumentState = { status: "pending" };

  constructor(
    readonly url: string,
    private readonly logger?: Logger,
  ) {}

  get state(): DocumentState {
    return this.current;
  }

  get status(): DocumentStatus {
    return this.current.status;
  }

  advance(next: DocumentState): DocumentState {
    const previous = this.current.status;
    this.current = transition(this.current, next);
    if (next.status !== "translating" || previous !== "translating") {
      this.logger?.debug({ from: previous, to: next.status }, "document stage changed");
    }
    return this.current;
  }

  fail(error: PipelineError): DocumentState {
    return this.advance({ status: "failed", failedIn: this.current.status, error });
  }
}
