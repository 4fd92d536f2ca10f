import dotenv from 'dotenv';

/**
 * Load profile-specific env files. Earlier files win over later ones and
 * variables already present in the process environment are never overridden.
 */
export function loadEnvFiles(profile = process.env.NODE_ENV ?? 'development'): void {
  dotenv.config({
    path: [`.env.${profile}.local`, `.env.${profile}`, '.env'],
  });
}
