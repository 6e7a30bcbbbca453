// Browser-like headers sent with every source request; the User-Agent is set per request.
export const common_headers: Record<string, string> = {
    'Accept': 'text/plain,text/html,application/json;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Cache-Control': 'no-cache',
};
