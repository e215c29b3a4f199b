export type AnyObject = Record<string, unknown>;

export interface WhatsAppWebhookBody {
  object?: string;
  entry?: Array<{
    id?: string;
    changes?: Array<{
      field?: string;
      value?: {
        messaging_product?: "whatsapp";
        metadata?: {
          display_phone_number?: string;
          phone_number_id?: string;
        };
        contacts?: Array<{ wa_id?: string; profile?: { name?: string } }>;
        messages?: WhatsAppMessage[];
        statuses?: WhatsAppStatus[];
      };
    }>;
  }>;
}

export interface WhatsAppMedia {
  id: string;
  mime_type?: string;
  sha256?: string;
  caption?: string;
}

export interface WhatsAppMessage {
  id: string;
  from: string;
  timestamp?: string;
  type: string;
  text?: { body?: string };
  image?: WhatsAppMedia;
  interactive?: {
    type?: string; // "button_reply" | "list_reply"
    button_reply?: { id: string; title: string };
    list_reply?: { id: string; title: string; description?: string };
  };
  button?: { payload?: string; text?: string };
}

export interface WhatsAppStatus {
  id?: string;
  recipient_id?: string;
  status?: "sent" | "delivered" | "read" | "failed" | "deleted";
  timestamp?: string;
  errors?: AnyObject[];
}

/** Response of GET /{media-id} */
export interface WhatsAppMediaInfo {
  url: string;
  mime_type?: string;
  file_size?: number;
  id?: string;
}
