import { authenticator } from 'otplib';

export type TotpGenerator = (secret: string) => string;

/** Current 6-digit code for a base32 shared secret (30 s time step). */
export const generateTotp: TotpGenerator = (secret) => authenticator.generate(secret);
