export interface TokenAuth {
  type: 'token'
  tokenEnv: string
}

export interface BasicAuth {
  type: 'basic'
  usernameEnv: string
  passwordEnv: string
}

/**
 * Public trackers need no credentials, so auth is optional in the config.
 */
export type AuthConfig = TokenAuth | BasicAuth
