import { Type, type Static } from "@sinclair/typebox";

/**
 * Where approved zone files come from. The CZDS client is the production
 * implementation; tests use an in-process stand-in.
 */
export interface ZoneFileSource {
  /** URLs of every zone file the account may download */
  listApproved(): Promise<string[]>;
  /**
   * Download one zone file into `destDir`.
   * @returns path of the written file
   */
  download(url: string, destDir: string): Promise<string>;
}

// ============================================================================
// CZDS API payloads
// ============================================================================

export const AuthResponseSchema = Type.Object({
  accessToken: Type.String({ minLength: 1 }),
  message: Type.Optional(Type.String()),
});

export type AuthResponse = Static<typeof AuthResponseSchema>;

export const DownloadLinksSchema = Type.Array(Type.String());

export type DownloadLinks = Static<typeof DownloadLinksSchema>;
