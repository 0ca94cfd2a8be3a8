/**
 * Where the current access credential lives. Implementations may be backed by
 * anything asynchronous (a secrets store, a database row, a file).
 */
export interface CredentialStorage {
  read(): Promise<string | undefined>;
  write(credential: string): Promise<void>;
  clear(): Promise<void>;
}

export class InMemoryCredentialStorage implements CredentialStorage {
  private credential?: string;

  constructor(initial?: string) {
    this.credential = initial;
  }

  async read(): Promise<string | undefined> {
    return this.credential;
  }

  async write(credential: string): Promise<void> {
    this.credential = credential;
  }

  async clear(): Promise<void> {
    this.credential = undefined;
  }
}
