import type { IdentifierConfig } from '../config/rate-limit-config.js';
import { CompositeKeyResolver } from './composite-key-resolver.js';
import {
  HeaderKeyResolver,
  type HeaderKeyResolverOptions,
} from './header-key-resolver.js';
import { IpKeyResolver, type IpKeyResolverOptions } from './ip-key-resolver.js';
import type { KeyResolver } from './key-resolver.js';
import { UserKeyResolver, type IdentityLookup } from './user-key-resolver.js';

export interface KeyResolverOptions {
  identity?: IdentityLookup;
  ip?: IpKeyResolverOptions;
  /** Fallback headers for `header` identifiers; the primary comes from config. */
  fallbackHeaders?: HeaderKeyResolverOptions['fallbackHeaders'];
}

export function createKeyResolver(
  identifier: IdentifierConfig,
  options: KeyResolverOptions = {},
): KeyResolver {
  const ipResolver = new IpKeyResolver(options.ip);
  switch (identifier.kind) {
    case 'ip':
      return ipResolver;
    case 'user':
      return new UserKeyResolver({ identity: options.identity, ipResolver });
    case 'header':
      return new HeaderKeyResolver({
        header: identifier.header,
        fallbackHeaders: options.fallbackHeaders,
        ipResolver,
      });
    case 'composite':
      return new CompositeKeyResolver(
        identifier.identifiers.map((child) => createKeyResolver(child, options)),
      );
  }
}

export { CompositeKeyResolver } from './composite-key-resolver.js';
export * from './header-key-resolver.js';
export * from './ip-address.js';
export * from './ip-key-resolver.js';
export type { KeyResolver } from './key-resolver.js';
export * from './user-key-resolver.js';
