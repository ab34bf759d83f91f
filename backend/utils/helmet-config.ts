import type helmet from 'helmet';

export type HelmetOptions = Parameters<typeof helmet>[0];

// The API only serves JSON, so nothing may be loaded or framed from it
export const helmetConfig: HelmetOptions = {
  contentSecurityPolicy: {
    useDefaults: false,
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
      baseUri: ["'none'"],
      formAction: ["'none'"],
    },
  },
  frameguard: { action: 'deny' },
  crossOriginResourcePolicy: { policy: 'same-site' },
};
