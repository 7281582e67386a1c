/**
 * Bulk user lookup via users/show_many.
 */

import { zendeskFetch, isRecord, type ZendeskSession } from "./client";

export interface UserIdentity {
  id: number;
  name: string;
  email: string;
}

/** users/show_many accepts at most 100 ids per request. */
export const MAX_IDS_PER_REQUEST = 100;

export function mapUser(raw: unknown): UserIdentity | null {
  if (!isRecord(raw) || typeof raw.id !== "number") return null;
  return {
    id: raw.id,
    name: typeof raw.name === "string" ? raw.name : "Unknown",
    email: typeof raw.email === "string" ? raw.email : "",
  };
}

/**
 * One request for up to MAX_IDS_PER_REQUEST ids. Ids the API does not know
 * (deleted users) are simply absent from the result.
 */
export async function fetchUsersByIds(session: ZendeskSession, ids: number[]): Promise<UserIdentity[]> {
  if (ids.length === 0) return [];
  if (ids.length > MAX_IDS_PER_REQUEST) {
    throw new RangeError(`users/show_many takes at most ${MAX_IDS_PER_REQUEST} ids, got ${ids.length}`);
  }

  const data = await zendeskFetch(session, `/api/v2/users/show_many.json?ids=${ids.join(",")}`, "users");
  const values = isRecord(data) && Array.isArray(data.users) ? data.users : [];

  const users: UserIdentity[] = [];
  for (const raw of values) {
    const user = mapUser(raw);
    if (user) users.push(user);
  }
  return users;
}
