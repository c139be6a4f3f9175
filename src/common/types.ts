/**
 * Status codes carried by matcache errors.
 */
export enum StatusCode {
	ERROR = 1,
	MISMATCH = 20,
	MISUSE = 21,
}
