import { BROWSER_USER_AGENTS, UserAgentProvider } from '../user-agent';

describe('UserAgentProvider', () => {
  it('picks from the built-in pool', () => {
    const provider = new UserAgentProvider({ random: () => 0 });

    expect(provider.getUserAgent()).toBe(BROWSER_USER_AGENTS[0]);
  });

  it('stays inside the pool at the top of the random range', () => {
    const provider = new UserAgentProvider({ pool: ['agent-a', 'agent-b'], random: () => 0.9999 });

    expect(provider.getUserAgent()).toBe('agent-b');
  });

  it('always returns a fixed identity when one is configured', () => {
    const provider = new UserAgentProvider({ customUserAgent: '  test-agent/1.0  ', random: () => 0.5 });

    expect(provider.getUserAgent()).toBe('test-agent/1.0');
  });

  it('ignores a blank fixed identity', () => {
    const provider = new UserAgentProvider({ customUserAgent: '   ', pool: ['agent-a'] });

    expect(provider.getUserAgent()).toBe('agent-a');
  });

  it('builds browser-like headers', () => {
    const provider = new UserAgentProvider({ customUserAgent: 'test-agent/1.0' });

    expect(provider.getHeaders()).toEqual({
      'User-Agent': 'test-agent/1.0',
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      DNT: '1',
      'Upgrade-Insecure-Requests': '1',
    });
  });

  it('lets additional headers override the defaults', () => {
    const provider = new UserAgentProvider({ customUserAgent: 'test-agent/1.0' });

    const headers = provider.getHeaders({ Accept: 'application/rss+xml', Authorization: 'Bearer test-secret' });

    expect(headers.Accept).toBe('application/rss+xml');
    expect(headers.Authorization).toBe('Bearer test-secret');
    expect(headers['User-Agent']).toBe('test-agent/1.0');
  });
});
