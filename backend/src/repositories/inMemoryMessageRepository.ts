import type { ChatMessage, MessageRepository } from "../services/chatService";

export function createInMemoryMessageRepository(): MessageRepository {
  const byMatchId = new Map<string, ChatMessage[]>();

  return {
    async append(message: ChatMessage): Promise<void> {
      const list = byMatchId.get(message.matchId) ?? [];
      list.push(message);
      byMatchId.set(message.matchId, list);
    },

    async listByMatch(matchId: string): Promise<ReadonlyArray<ChatMessage>> {
      const list = byMatchId.get(matchId) ?? [];
      // Array#sort is stable, so equal timestamps keep insertion order.
      return [...list].sort((a, b) => a.createdAtMs - b.createdAtMs);
    }
  };
}
