/**
 * The registry installed when none exists at the default location.
 *
 * Covers the 1Password CLI 2.31.1 release on every supported platform,
 * verified against the vendor's published checksums on 2025-07-28.
 */

/** Version covered by {@link BUNDLED_REGISTRY_YAML}. */
export const BUNDLED_VERSION = '2.31.1'

/** Document text written by bootstrap. */
export const BUNDLED_REGISTRY_YAML = `schema_version: 1
generated_at: "2025-07-28T00:00:00Z"
versions:
  "2.31.1":
    linux_amd64: "0fd8da9c6b6301781f50ef57cebbfd7d42d072777bcb4649ef5b6d360629b876"
    linux_arm64: "47bcd4dbeacefcd01ae8c913e61721ae71ac4f6a0b9150f48467ff719d494ff7"
    darwin_amd64: "019f37e33a6d4f7824cda14eee5e24c2947d58d94ed7dd3b3fc3cbcd644647df"
    darwin_arm64: "71d38ddee25d34a9159b81d8c16844c3869defd7cc1563cc8f216a20439ceba4"
    windows_amd64: "9e54520aa136ecd6bc7082ec719b68f00bd23cb575c6e787d62f34cc44895bbb"
`
