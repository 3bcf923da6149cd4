import type { PlayerState } from "@runeforge/shared-protocol";
import { UnitEntity } from "./unit-entity";

/**
 * Server-only player wrapper around synced state.
 */
export class ServerPlayer extends UnitEntity<PlayerState> {
  /** System messages waiting to be sent to the client. */
  pendingSystemMessages: string[] = [];

  sendSystemMessage(message: string): void {
    this.pendingSystemMessages.push(message);
  }

  dismount(): void {
    this.synced.isMounted = false;
  }
}
