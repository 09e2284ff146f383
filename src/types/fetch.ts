/** The subset of fetch the services call; injectable for tests. */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
