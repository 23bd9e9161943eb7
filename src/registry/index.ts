export { RdapClient, IANA_RDAP_BOOTSTRAP_URL } from './rdap-client.js';
