import { buildApp } from "../src/app";

export type TestApp = Awaited<ReturnType<typeof buildApp>>;

export interface TestAccount {
  id: string;
  username: string;
  token: string;
}

export const PASSWORD = "secret123";

export function bearer(token: string) {
  return { authorization: `Bearer ${token}` };
}

export async function createAccount(
  app: TestApp,
  username: string
): Promise<TestAccount> {
  const response = await app.inject({
    method: "POST",
    url: "/accounts",
    payload: {
      username,
      email: `${username}@example.com`,
      password: PASSWORD,
    },
  });
  if (response.statusCode !== 201) {
    throw new Error(`registration failed: ${response.body}`);
  }
  const body = response.json<{
    account: { id: string };
    access_token: string;
  }>();
  return { id: body.account.id, username, token: body.access_token };
}

export async function createMedia(
  app: TestApp,
  owner: TestAccount,
  overrides: Record<string, unknown> = {}
): Promise<string> {
  const response = await app.inject({
    method: "POST",
    url: "/media",
    headers: bearer(owner.token),
    payload: {
      title: "Sunset Study",
      category: "artwork",
      content_url: "https://cdn.example.com/sunset.png",
      ...overrides,
    },
  });
  if (response.statusCode !== 201) {
    throw new Error(`media creation failed: ${response.body}`);
  }
  return response.json<{ media: { id: string } }>().media.id;
}

export async function createRating(
  app: TestApp,
  rater: TestAccount,
  mediaId: string,
  score: number,
  comment?: string
): Promise<string> {
  const response = await app.inject({
    method: "POST",
    url: "/ratings",
    headers: bearer(rater.token),
    payload: { media_id: mediaId, score, comment },
  });
  if (response.statusCode !== 201) {
    throw new Error(`rating creation failed: ${response.body}`);
  }
  return response.json<{ rating: { id: string } }>().rating.id;
}
