export const USER_ROLES = ['Admin', 'User'] as const

export type UserRole = (typeof USER_ROLES)[number]

/** 認証済みの呼び出し元 */
export interface Identity {
  readonly userId: string
  readonly name: string | null
  readonly role: UserRole
}

export interface JwtPayload {
  sub: string
  name: string | null
  role: UserRole
  iat: number
  exp: number
}
