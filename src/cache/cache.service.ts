import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import NodeCache from 'node-cache';

@Injectable()
export class CacheService {
  private readonly myCache: NodeCache;
  private readonly ttl: number;

  constructor(configService: ConfigService) {
    this.ttl = configService.get<number>('CACHE_TTL', 60);
    this.myCache = new NodeCache({ maxKeys: 100 });
  }

  set<T>(key: string, value: T) {
    this.myCache.set(key, value, this.ttl);
  }

  get<T>(key: string): T | undefined {
    return this.myCache.get<T>(key);
  }

  del(key: string) {
    this.myCache.del(key);
  }

  delByPrefix(prefix: string) {
    this.myCache.del(
      this.myCache.keys().filter((key) => key.startsWith(prefix)),
    );
  }
}
