export interface DomainParts {
    domainName: string;
    domainPrefix: string;
}

/**
 * Splits the host header value into domain name and domain prefix.
 * The port suffix is removed from the first colon on.
 * Hosts with single label use the whole domain name as the prefix.
 * @example
 * splitDomain('api.example.com:8443') => { domainName: 'api.example.com', domainPrefix: 'api' }
 * splitDomain('localhost') => { domainName: 'localhost', domainPrefix: 'localhost' }
 */
export function splitDomain(host: string): DomainParts {
    const colonIndex = host.indexOf(':');
    const domainName = colonIndex === -1 ? host : host.slice(0, colonIndex);
    const labels = domainName.split('.');
    return {
        domainName,
        domainPrefix: labels.length > 1 ? labels[0] : domainName,
    };
}
