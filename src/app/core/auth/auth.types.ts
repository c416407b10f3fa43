export interface LoginRequest {
  email?: string;
  password?: string;
}

/** Wire form of a {@link LoginRequest}: absent fields are left out, never sent as null. */
export type LoginParameters = Partial<Record<keyof LoginRequest, string>>;

export interface LoginResponse {
  token: string;
}
