import { AxiosInstance, AxiosRequestConfig } from 'axios';
import { IP_API_URL } from '~/config';
import { GeoLookup, GeoLookupResponse } from '~/geo/GeoLookup';
import { ProbeError } from '~/proxy_checker/errors';

interface IpApiResponse {
    status: 'success' | 'fail',
    message?: string,
    country?: string,
    countryCode?: string,
    regionName?: string,
    city?: string,
    query?: string,
}

export class IpApiGeo extends GeoLookup {
    public readonly url = IP_API_URL;

    public async lookup(client: AxiosInstance, options?: AxiosRequestConfig): Promise<GeoLookupResponse> {
        const data = await client
        .get<IpApiResponse | string>(this.url, options)
        .then((r) => r.data);

        return Mapper.toGeoLookupResponse(data);
    }
}

class Mapper {
    public static toGeoLookupResponse(data: IpApiResponse | string): GeoLookupResponse {
        if (typeof data !== 'object' || data === null) {
            throw new ProbeError('ip-api answered with a non-JSON body');
        }

        if (data.status !== 'success') {
            throw new ProbeError(`ip-api lookup failed: ${ data.message ?? data.status }`);
        }

        return {
            ip: data.query ?? '',
            location: {
                country: data.country ?? '',
                countryCode: data.countryCode ?? '',
                city: data.city ?? '',
                region: data.regionName ?? '',
            },
        };
    }
}
