export type Role = "user" | "assistant";

export interface Turn {
  readonly role: Role;
  readonly content: string;
}
