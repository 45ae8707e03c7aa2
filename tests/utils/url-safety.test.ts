import { describe, it, expect, vi } from 'vitest';
import { BlockedUrlError, assertSafeUrl, classifyAddress, type HostLookup } from '../../src/utils/url-safety.js';

const publicLookup = vi.fn<HostLookup>(async () => ['203.0.113.10']);

describe('url-safety', () => {
  describe('classifyAddress', () => {
    it('should classify loopback, private and link-local addresses', () => {
      expect(classifyAddress('127.0.0.1')).toBe('localhost');
      expect(classifyAddress('10.1.2.3')).toBe('private_ip');
      expect(classifyAddress('172.16.0.1')).toBe('private_ip');
      expect(classifyAddress('192.168.1.1')).toBe('private_ip');
      expect(classifyAddress('169.254.1.1')).toBe('link_local');
      expect(classifyAddress('::1')).toBe('localhost');
      expect(classifyAddress('fd00::1')).toBe('private_ip');
      expect(classifyAddress('fe80::1')).toBe('link_local');
      expect(classifyAddress('::ffff:10.0.0.1')).toBe('private_ip');
    });

    it('should single out cloud metadata endpoints', () => {
      expect(classifyAddress('169.254.169.254')).toBe('metadata');
    });

    it('should pass public addresses', () => {
      expect(classifyAddress('172.32.0.1')).toBeNull();
      expect(classifyAddress('203.0.113.10')).toBeNull();
      expect(classifyAddress('2001:db8::1')).toBeNull();
    });
  });

  describe('assertSafeUrl', () => {
    it('should accept a public https URL', async () => {
      const parsed = await assertSafeUrl('https://files.example/report.csv', {
        allowPrivateHosts: false,
        lookup: publicLookup,
      });
      expect(parsed.hostname).toBe('files.example');
      expect(publicLookup).toHaveBeenCalledWith('files.example');
    });

    it('should refuse schemes other than http and https', async () => {
      const error = await assertSafeUrl('file:///etc/hosts', { allowPrivateHosts: true }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(BlockedUrlError);
      expect(error).toMatchObject({
        category: 'protocol',
        message: 'Refusing to fetch file:///etc/hosts: scheme file: is not allowed; use http or https',
      });
    });

    it('should refuse text that is not a URL', async () => {
      await expect(assertSafeUrl('not a url', { allowPrivateHosts: false })).rejects.toMatchObject({
        category: 'invalid',
      });
    });

    it('should refuse loopback names and literals', async () => {
      await expect(assertSafeUrl('http://localhost:8080/', { allowPrivateHosts: false })).rejects.toMatchObject({
        category: 'localhost',
      });
      await expect(assertSafeUrl('http://127.0.0.1/', { allowPrivateHosts: false })).rejects.toMatchObject({
        category: 'localhost',
        message: 'Refusing to fetch http://127.0.0.1/: loopback host 127.0.0.1',
      });
      await expect(assertSafeUrl('http://[::1]/', { allowPrivateHosts: false })).rejects.toMatchObject({
        category: 'localhost',
      });
    });

    it('should refuse metadata host names without resolving them', async () => {
      const lookup = vi.fn<HostLookup>(async () => ['203.0.113.10']);
      await expect(
        assertSafeUrl('http://metadata.google.internal/computeMetadata/v1/', { allowPrivateHosts: false, lookup })
      ).rejects.toMatchObject({ category: 'metadata' });
      expect(lookup).not.toHaveBeenCalled();
    });

    it('should refuse a public name that resolves to a private address', async () => {
      const lookup = vi.fn<HostLookup>(async () => ['203.0.113.10', '10.0.0.5']);
      await expect(
        assertSafeUrl('https://intranet.example/', { allowPrivateHosts: false, lookup })
      ).rejects.toMatchObject({
        category: 'private_ip',
        message: 'Refusing to fetch https://intranet.example/: private address 10.0.0.5',
      });
    });

    it('should leave unresolvable hosts to the request itself', async () => {
      const lookup = vi.fn<HostLookup>(async () => {
        throw new Error('ENOTFOUND');
      });
      const parsed = await assertSafeUrl('https://gone.example/', { allowPrivateHosts: false, lookup });
      expect(parsed.href).toBe('https://gone.example/');
    });

    it('should allow private hosts when configured to', async () => {
      const parsed = await assertSafeUrl('http://localhost:3000/export', { allowPrivateHosts: true });
      expect(parsed.port).toBe('3000');
    });
  });
});
