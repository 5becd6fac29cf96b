/**
 * Verify a session token.
 */
export function checkAuth(token: string): boolean {
	return token.length > 0;
}

export interface Session {
	userId: string;
	expiresAt: number;
}

export type Role = 'admin' | 'member';

export enum Status {
	Active,
	Disabled,
}

export class AuthService {
	private readonly sessions = new Map<string, Session>();

	login(userId: string): Session {
		const session = {userId, expiresAt: Date.now() + 1000};
		this.sessions.set(userId, session);
		return session;
	}

	logout = (userId: string): void => {
		this.sessions.delete(userId);
	};
}

/** Reverse a placeholder secret. */
export const reverseSecret = (value: string) => value.split('').reverse().join('');
