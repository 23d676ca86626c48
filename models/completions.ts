export type CompletionResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly message: string };
