import type { Routing } from '../routing/table.js';
import type { StateManager } from './state.js';

const normalize = (handle: string) => handle.replace(/^@/, '').toLowerCase();

/**
 * Resolves people across the two systems: tracker logins map to Telegram
 * handles through the routing table, handles map to chat ids through the users
 * the bot has seen. A private chat id equals the user id.
 */
export class Directory {
  private handleToLogin = new Map<string, string>();

  constructor(
    private routing: Routing,
    private state: StateManager
  ) {
    for (const [login, handle] of routing.loginToHandle) {
      this.handleToLogin.set(handle, login);
    }
  }

  handleForLogin(login: string): string | null {
    return this.routing.loginToHandle.get(login.toLowerCase()) ?? null;
  }

  loginForHandle(handle: string | null): string | null {
    if (!handle) return null;
    return this.handleToLogin.get(normalize(handle)) ?? null;
  }

  chatIdForHandle(handle: string): number | null {
    return this.state.findUserIdByUsername(normalize(handle));
  }

  chatIdForLogin(login: string): number | null {
    const handle = this.handleForLogin(login);
    return handle ? this.chatIdForHandle(handle) : null;
  }

  /** Chat ids of the handles the bot has already seen; unknown handles are dropped. */
  resolveHandles(handles: readonly string[]): number[] {
    const ids: number[] = [];
    for (const handle of handles) {
      const id = this.chatIdForHandle(handle);
      if (id !== null) ids.push(id);
    }
    return ids;
  }
}
