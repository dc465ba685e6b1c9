import { Config } from '../shared/config';
import { Logger } from '../shared/logger';
import { UserStore } from './store/userStore';

/**
 * Creates the configured superuser when no superadmin exists yet.
 * Returns true when an account was created.
 */
export async function ensureSuperuser(
  userStore: UserStore,
  superuser: Config['superuser'],
  logger: Logger
): Promise<boolean> {
  if (!superuser) {
    logger.warn('SUPERUSER_USERNAME/SUPERUSER_PASSWORD not set, skipping superuser creation');
    return false;
  }

  if ((await userStore.countByRole('superadmin')) > 0) {
    logger.info('Superadmin already exists');
    return false;
  }

  if (await userStore.getByUsername(superuser.username)) {
    logger.warn('Username taken by a non-superadmin account', { username: superuser.username });
    return false;
  }

  await userStore.create({
    username: superuser.username,
    password: superuser.password,
    email: superuser.email,
    role: 'superadmin',
  });
  logger.info('Superuser created', { username: superuser.username });
  return true;
}
