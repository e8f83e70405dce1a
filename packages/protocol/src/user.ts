/** Display info embedded in chat payloads */
export interface MessageAuthor {
  id: string;
  display_name: string | null;
  avatar_url: string | null;
}

export interface Identity {
  id: string;
  email?: string;
}
