/**
 * Source of short-lived bearer tokens for the Speech service.
 * The front end uses these so the subscription key never leaves the server.
 */
export interface ISpeechAuth {
  readonly region: string;
  getToken(): Promise<string>;
}
