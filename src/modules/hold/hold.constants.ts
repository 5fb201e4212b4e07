/**
 * Hold key layout. The `{showtimeId}` hash tag keeps all keys of one
 * showtime in the same cluster slot so a script may touch them together.
 */
export const HOLD_KEYS = {
  SEAT: (showtimeId: string, seatId: string) =>
    `hold:{${showtimeId}}:seat:${seatId}`,
  INDEX: (showtimeId: string) => `hold:{${showtimeId}}:index`,
} as const;

export type HoldScriptName = 'acquire' | 'release';

// Lua scripts for atomic hold operations
export const HOLD_SCRIPTS: Readonly<Record<HoldScriptName, string>> = {
  /**
   * All-or-nothing acquire
   * KEYS[1]: showtime index (sorted set)
   * KEYS[2..n+1]: seat keys
   * ARGV[1]: holder id
   * ARGV[2]: TTL in milliseconds
   * ARGV[3]: expiry timestamp in milliseconds (index score)
   * ARGV[4..n+3]: seat ids, same order as the seat keys
   * ARGV[n+4..]: holders whose seats may be taken over
   * Returns: seat ids held by another holder; empty when granted
   */
  acquire: `
    local holder = ARGV[1]
    local ttl = tonumber(ARGV[2])
    local expiresAt = tonumber(ARGV[3])
    local conflicts = {}

    local replaceable = {}
    for j = #KEYS + 3, #ARGV do
      replaceable[ARGV[j]] = true
    end

    for i = 2, #KEYS do
      local current = redis.call('GET', KEYS[i])
      if current and current ~= holder and not replaceable[current] then
        table.insert(conflicts, ARGV[i + 2])
      end
    end

    if #conflicts > 0 then
      return conflicts
    end

    for i = 2, #KEYS do
      redis.call('SET', KEYS[i], holder, 'PX', ttl)
      redis.call('ZADD', KEYS[1], expiresAt, ARGV[i + 2])
    end

    if redis.call('PTTL', KEYS[1]) < ttl then
      redis.call('PEXPIRE', KEYS[1], ttl)
    end

    return conflicts
  `,

  /**
   * Holder-checked release
   * KEYS[1]: showtime index (sorted set)
   * KEYS[2..n+1]: seat keys
   * ARGV[1]: holder id
   * ARGV[2..n+1]: seat ids, same order as the seat keys
   * Returns: number of seats released
   */
  release: `
    local released = 0

    for i = 2, #KEYS do
      if redis.call('GET', KEYS[i]) == ARGV[1] then
        redis.call('DEL', KEYS[i])
        redis.call('ZREM', KEYS[1], ARGV[i])
        released = released + 1
      end
    end

    return released
  `,
};
