/** Dual-stack API host */
export const PORKBUN_API = 'https://api.porkbun.com/api/json/v3';

/** IPv4-only API host, so `ping` reports the IPv4 address */
export const PORKBUN_API_IPV4 = 'https://api-ipv4.porkbun.com/api/json/v3';

/** Value of the `status` field on successful responses */
export const PORKBUN_SUCCESS = 'SUCCESS';

/** Overall deadline for all remote calls of one run */
export const DEFAULT_TIMEOUT_MS = 60_000;

/** Deadline for the optional availability check */
export const CHECK_URL_TIMEOUT_MS = 5_000;

/** Config file name, looked up in $HOME */
export const CONFIG_FILE_NAME = '.porkbungo';

/** Longest delay a Node timer accepts (2^31-1 ms, about 24.8 days) */
export const MAX_TIMEOUT_MS = 2_147_483_647;
