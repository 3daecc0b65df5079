import type { ChatMessage, MessageRepository } from "../services/chatService";
import { asNumber, asString, type SqlClient } from "./postgresCore";

function toMessage(row: Record<string, unknown>): ChatMessage {
  return {
    messageId: asString(row.message_id),
    matchId: asString(row.match_id),
    senderId: asString(row.sender_id),
    receiverId: asString(row.receiver_id),
    content: asString(row.content),
    createdAtMs: asNumber(row.created_at_ms)
  };
}

export function createPostgresMessageRepository(client: SqlClient): MessageRepository {
  return {
    async append(message: ChatMessage): Promise<void> {
      await client.query(
        `INSERT INTO chat_messages (message_id, match_id, sender_id, receiver_id, content, created_at_ms)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [message.messageId, message.matchId, message.senderId, message.receiverId, message.content, message.createdAtMs]
      );
    },

    async listByMatch(matchId: string): Promise<ReadonlyArray<ChatMessage>> {
      const res = await client.query(
        `SELECT message_id, match_id, sender_id, receiver_id, content, created_at_ms
         FROM chat_messages
         WHERE match_id = $1
         ORDER BY created_at_ms ASC, seq ASC`,
        [matchId]
      );
      return res.rows.map(toMessage);
    }
  };
}
