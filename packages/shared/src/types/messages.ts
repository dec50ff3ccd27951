/**
 * Transport-neutral message shapes. A chat transport turns its own updates
 * into an `InboundEvent` and delivers `OutboundMessage`s back to the user.
 */

export type AttachmentKind = 'image' | 'document';

export interface InboundAttachment {
  kind: AttachmentKind;
  filename: string;
  /** As reported by the transport; inferred from the extension when absent. */
  mimeType?: string;
  caption?: string;
  /** Fetches the file bytes. Only called once the type has been accepted. */
  download: () => Promise<Uint8Array>;
}

export interface InboundEvent {
  userId: string;
  displayName: string;
  messageText?: string;
  attachment?: InboundAttachment;
}

export type MarkupLanguage = 'HTML';

export interface OutboundMessage {
  userId: string;
  markupText: string;
  markupLanguage: MarkupLanguage;
}

export interface ReplyChannel {
  send(message: OutboundMessage): Promise<void>;
  sendTyping(): Promise<void>;
}
