import { ulid } from "ulid"

function generateId(prefix: string): string {
  return `${prefix}_${ulid()}`
}

export const messageId = () => generateId("msg")
export const eventId = () => generateId("evt")
export const connectionId = () => generateId("conn")
