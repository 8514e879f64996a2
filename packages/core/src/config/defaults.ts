/**
 * Default Configuration Values
 */

/**
 * Characters left out of generated passwords. Each one either breaks a
 * connection URI (`:`, `/`, `@`) or needs escaping in a quoted literal.
 */
export const DEFAULT_EXCLUDE_CHARACTERS = ':/@"\'\\';

/** CA bundle shipped with the Lambda base images */
export const DEFAULT_SSL_ROOT_CERT_PATH = '/etc/pki/tls/cert.pem';

export const DEFAULT_CONNECT_TIMEOUT_SECONDS = 5;

export const DEFAULT_DATABASE_NAME = 'postgres';

export const DEFAULT_DATABASE_PORT = 5432;
