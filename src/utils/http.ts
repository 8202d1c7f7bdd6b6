import axios, { AxiosInstance } from 'axios';

const DEFAULT_TIMEOUT = 15000;
// Some providers reject requests without a desktop browser User-Agent
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export function createHttpClient(baseURL?: string, timeout: number = DEFAULT_TIMEOUT): AxiosInstance {
  return axios.create({
    baseURL,
    timeout,
    headers: {
      'User-Agent': DEFAULT_USER_AGENT,
      'Accept': 'application/json, */*;q=0.8',
    },
  });
}
