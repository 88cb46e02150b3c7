import bcrypt from 'bcryptjs';
import { logger } from '../../utils/logger';

const DEFAULT_BCRYPT_ROUNDS = 10;

export class PasswordHasher {
    constructor(private readonly rounds: number = DEFAULT_BCRYPT_ROUNDS) {}

    async hash(password: string): Promise<string> {
        return bcrypt.hash(password, this.rounds);
    }

    /**
     * bcrypt compares in constant time. A hash that bcrypt cannot parse
     * counts as a mismatch.
     */
    async verify(password: string, hash: string): Promise<boolean> {
        try {
            return await bcrypt.compare(password, hash);
        } catch (err) {
            logger.warn({ err }, 'Stored password hash could not be parsed');
            return false;
        }
    }
}
