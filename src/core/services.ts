/**
 * Well-known TCP port table
 */

const SERVICE_ENTRIES: ReadonlyArray<readonly [number, string]> = [
  [20, 'FTP-Data'],
  [21, 'FTP'],
  [22, 'SSH'],
  [23, 'Telnet'],
  [25, 'SMTP'],
  [53, 'DNS'],
  [80, 'HTTP'],
  [110, 'POP3'],
  [111, 'RPCbind'],
  [135, 'MSRPC'],
  [139, 'NetBIOS'],
  [143, 'IMAP'],
  [389, 'LDAP'],
  [443, 'HTTPS'],
  [445, 'SMB'],
  [465, 'SMTPS'],
  [587, 'Submission'],
  [636, 'LDAPS'],
  [993, 'IMAPS'],
  [995, 'POP3S'],
  [1433, 'MSSQL'],
  [1521, 'Oracle'],
  [2049, 'NFS'],
  [3306, 'MySQL'],
  [3389, 'RDP'],
  [5432, 'PostgreSQL'],
  [5900, 'VNC'],
  [6379, 'Redis'],
  [8080, 'HTTP-Alt'],
  [8443, 'HTTPS-Alt'],
  [9200, 'Elasticsearch'],
  [11211, 'Memcached'],
  [27017, 'MongoDB'],
];

/**
 * Port number to service label. Built once, never mutated.
 */
export const WELL_KNOWN_PORTS: ReadonlyMap<number, string> = new Map(SERVICE_ENTRIES);

/**
 * Ports probed by the `common` preset
 */
export const COMMON_PORTS: readonly number[] = Object.freeze([
  21, 22, 23, 25, 53, 80, 110, 143, 443, 445, 993, 995, 3306, 3389, 5432, 6379, 8080, 8443, 27017,
]);

export function lookupService(port: number): string | undefined {
  return WELL_KNOWN_PORTS.get(port);
}
