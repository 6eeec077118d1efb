/**
 * Output templates handed to git, and the delimiters the decoders split on.
 * A template and its decoder must change together.
 */

/**
 * Field separator for log and tag templates. Not escaped by git, so a
 * subject or body containing it is mis-split.
 */
export const FIELD_DELIMITER = '|'

/**
 * hash|author name|author email|author time|committer name|committer email|committer time|parents|subject|body
 */
export const LOG_FORMAT = '--pretty=format:%H|%an|%ae|%at|%cn|%ce|%ct|%P|%s|%b'

export const LOG_FIELD_COUNT = 10
export const LOG_MIN_FIELDS = 9

/**
 * A multi-line %(body) spills onto following lines; only its first line is
 * kept and the rest are dropped as malformed.
 */
export const TAG_FORMAT =
  '--format=%(refname:short)|%(objecttype)|%(objectname)|%(*objectname)|%(taggername)|%(taggeremail)|%(taggerdate:unix)|%(subject)|%(body)'

export const TAG_FIELD_COUNT = 9

/**
 * ref slot, hash, commit time, reflog subject ("On main: message")
 */
export const STASH_FORMAT = '--format=%gd %H %ct %gs'

export const STASH_FIELD_COUNT = 4

/** Porcelain status lines are `XY path`; the path starts at this offset. */
export const STATUS_PATH_OFFSET = 3

/** Remote-tracking names in `git branch --all` output start with this. */
export const REMOTE_BRANCH_PREFIX = 'remotes/'

export const UNKNOWN_BRANCH = 'unknown'

export const DEFAULT_LOG_MAX_COUNT = 100

export const DEFAULT_GIT_TIMEOUT_MS = 60_000
