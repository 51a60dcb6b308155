export const SYNTHESIS_FORMATS = ["mp3", "wav", "ogg"] as const;
export type SynthesisFormat = (typeof SYNTHESIS_FORMATS)[number];

export interface SynthesisRequest {
  readonly text: string;
  /** Full voice name, e.g. "en-US-JennyNeural". */
  readonly voice: string;
  /** Locale the text is written in, e.g. "en-US". */
  readonly language: string;
  readonly format: SynthesisFormat;
  /** Relative speaking rate, 1.0 is normal. */
  readonly rate?: number;
}

export interface SynthesisResult {
  readonly audio: Uint8Array;
  /** Content type declared by the service. */
  readonly contentType: string;
}

export interface ITTS {
  synthesize(request: Readonly<SynthesisRequest>): Promise<SynthesisResult>;
}
