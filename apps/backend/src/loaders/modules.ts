import type { IModule } from '@everly/types';
import { env, type EnvConfig } from '../config/env.js';
import { AUDIO_TYPES, IMAGE_TYPES, VIDEO_TYPES } from '../lib/files.js';
import type { TokenService } from '../services/token.service.js';
import { UsersModule } from '../modules/users/index.js';
import { AuthModule } from '../modules/auth/index.js';
import { DiariesModule } from '../modules/diaries/index.js';
import { MediaModule } from '../modules/media/index.js';

/**
 * Public URL of a directory under STATIC_ROOT, e.g.
 * `static/uploads/media` becomes `http://localhost:8000/static/uploads/media`.
 */
export function publicUrlFor(directory: string, config: Pick<EnvConfig, 'PUBLIC_BASE_URL' | 'STATIC_ROOT'> = env): string {
  const normalize = (value: string) => value.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+$/, '');
  const root = normalize(config.STATIC_ROOT);
  const relative = normalize(directory);
  const inside = relative === root ? '' : relative.startsWith(`${root}/`) ? relative.slice(root.length + 1) : null;
  if (inside === null) {
    throw new Error(`Upload directory "${directory}" is not inside STATIC_ROOT "${config.STATIC_ROOT}"`);
  }
  const base = config.PUBLIC_BASE_URL.replace(/\/+$/, '');
  return inside ? `${base}/static/${inside}` : `${base}/static`;
}

export interface IFeatureModules {
  /** Every module, in registration order. */
  modules: IModule[];

  /** The users module, which also backs the authentication guard's account lookup. */
  users: UsersModule;
}

/**
 * Build the feature modules from the environment, in registration order.
 *
 * Modules are wired explicitly: auth receives the users module and the token
 * service shared with the authentication guard. Media can be switched off
 * with `ENABLE_MEDIA=false`.
 */
export function createModules(tokens: TokenService, config: EnvConfig = env): IFeatureModules {
  const users = new UsersModule({
    profileUploadPath: config.PROFILE_UPLOAD_PATH,
    profileUrlPrefix: publicUrlFor(config.PROFILE_UPLOAD_PATH, config),
    maxProfileImageSize: config.PROFILE_MAX_IMAGE_SIZE,
    allowedImageTypes: IMAGE_TYPES
  });

  const modules: IModule[] = [
    users,
    new AuthModule(users, tokens, { googleUserInfoUrl: config.GOOGLE_USERINFO_URL }),
    new DiariesModule({
      defaultPageSize: config.DIARY_DEFAULT_PAGE_SIZE,
      maxPageSize: config.DIARY_MAX_PAGE_SIZE,
      searchResultLimit: config.DIARY_SEARCH_RESULT_LIMIT,
      cacheTtlSeconds: config.DIARY_CACHE_TTL_SECONDS
    })
  ];

  if (config.ENABLE_MEDIA) {
    modules.push(new MediaModule({
      uploadPath: config.MEDIA_UPLOAD_PATH,
      urlPrefix: publicUrlFor(config.MEDIA_UPLOAD_PATH, config),
      maxFileSize: config.MEDIA_MAX_FILE_SIZE,
      allowedTypes: [...IMAGE_TYPES, ...VIDEO_TYPES, ...AUDIO_TYPES]
    }));
  }

  return { modules, users };
}
