export interface AccessTokenProvider {
  getToken(): string;
}

export type AccessTokenInput = string | AccessTokenProvider;

export type TokenSource =
  | { kind: 'literal'; value: string }
  | { kind: 'derived'; provider: AccessTokenProvider };

export const toTokenSource = (input: AccessTokenInput): TokenSource =>
  typeof input === 'string' ? { kind: 'literal', value: input } : { kind: 'derived', provider: input };

export const resolveAccessToken = (input: AccessTokenInput): string => {
  const source = toTokenSource(input);
  switch (source.kind) {
    case 'literal':
      return source.value;
    case 'derived':
      return source.provider.getToken();
  }
};
