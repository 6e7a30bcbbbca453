export class ProbeError extends Error {
    constructor(message: string) {
        super(`${ ProbeError.name }: ${ message }`);
    }
}

export class InvalidProxyError extends Error {
    constructor(proxy: string) {
        super(`${ InvalidProxyError.name }: ${ proxy } is not a valid ip:port address`);
    }
}
