export { ImapFlowTransport, ImapFlowSession } from "./client.js";
export type {
  IdleHandle,
  ImapTransportOptions,
  MailConnection,
  MailSession,
  MailTransport,
  MailboxStatus,
  SecureConnection,
} from "./types.js";
