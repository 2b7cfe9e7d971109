// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type EntryId = Brand<number, "EntryId">;
export type AuthorId = Brand<number, "AuthorId">;
export type Timestamp = Brand<number, "Timestamp">;

export const asEntryId = (n: number): EntryId => n as EntryId;
export const asAuthorId = (n: number): AuthorId => n as AuthorId;
export const asTimestamp = (n: number): Timestamp => n as Timestamp;
