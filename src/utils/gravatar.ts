import crypto from 'crypto';

export interface GravatarOptions {
  size?: number;
  rating?: 'g' | 'pg' | 'r' | 'x';
  defaultImage?: string;
}

export function gravatarUrl(email: string, options: GravatarOptions = {}): string {
  const { size = 100, rating = 'g', defaultImage = 'retro' } = options;
  const hash = crypto.createHash('md5').update(email.trim().toLowerCase()).digest('hex');
  return `https://www.gravatar.com/avatar/${hash}?s=${size}&d=${defaultImage}&r=${rating}`;
}
