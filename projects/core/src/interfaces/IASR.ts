export const RECOGNITION_FORMATS = ["wav", "ogg"] as const;
export type RecognitionFormat = (typeof RECOGNITION_FORMATS)[number];

/**
 * Outcome reported by the recognition service for a finished utterance.
 * Only "Success" carries text; the others mean no speech was recognized.
 */
export type RecognitionStatus =
  | "Success"
  | "NoMatch"
  | "InitialSilenceTimeout"
  | "BabbleTimeout";

export interface RecognitionRequest {
  readonly audio: Uint8Array;
  readonly format: RecognitionFormat;
  readonly language: string;
}

export interface RecognitionResult {
  readonly text: string;
  readonly status: RecognitionStatus;
  readonly language: string;
  /** Confidence of the best hypothesis, 0.0 to 1.0 */
  readonly confidence?: number;
  /** Start of the recognized speech within the audio. */
  readonly offsetMs?: number;
  readonly durationMs?: number;
}

export interface IASR {
  recognize(request: Readonly<RecognitionRequest>): Promise<RecognitionResult>;
}
