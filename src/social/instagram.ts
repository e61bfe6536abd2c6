import axios, { type AxiosInstance } from 'axios';

export interface SourceResponse {
  status: number;
  body: string;
}

// Raw transport to the content platform. Throws only when no response arrived.
export interface ContentSource {
  request(handle: string): Promise<SourceResponse>;
}

const PROFILE_URL = 'https://www.instagram.com/api/v1/users/web_profile_info/';

const HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Linux; Android 9; GM1903) AppleWebKit/537.36 (KHTML, like Gecko) Version/4.0 Chrome/75.0.3770.143 Mobile Safari/537.36',
  Accept: 'application/json',
  'X-IG-App-ID': '936619743392459'
};

export class InstagramSource implements ContentSource {
  constructor(
    private readonly http: AxiosInstance = axios.create(),
    private readonly timeoutMs = 10_000
  ) {}

  async request(handle: string): Promise<SourceResponse> {
    const resp = await this.http.get<string>(PROFILE_URL, {
      params: { username: handle },
      headers: HEADERS,
      timeout: this.timeoutMs,
      responseType: 'text',
      // keep the raw body; the fetcher decides what counts as malformed
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true
    });
    return { status: resp.status, body: typeof resp.data === 'string' ? resp.data : '' };
  }
}
