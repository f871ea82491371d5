import { Type } from 'class-transformer';
import { IsArray, IsIn, IsInt, IsObject, IsOptional, IsString, Matches, Max, Min, ValidateNested } from 'class-validator';
import { Dictionary } from '../utils/dictionary';
import { Slugs } from './slugs';

export class HealthCheckSpec {
  @IsArray()
  @IsString({ each: true })
  test!: string[];

  @IsOptional()
  @Matches(Slugs.DurationValidator, { message: `interval ${Slugs.DurationDescription}` })
  interval?: string;

  @IsOptional()
  @Matches(Slugs.DurationValidator, { message: `timeout ${Slugs.DurationDescription}` })
  timeout?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  retries?: number;

  @IsOptional()
  @Matches(Slugs.DurationValidator, { message: `start_period ${Slugs.DurationDescription}` })
  start_period?: string;
}

export class ServiceSpec {
  @Matches(Slugs.ServiceSlugValidator, { message: `name ${Slugs.ServiceSlugDescription}` })
  name!: string;

  @IsString()
  image!: string;

  /**
   * Build context of the image, relative to the stack file. Services without one use a prebuilt image.
   */
  @IsOptional()
  @IsString()
  build?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  depends_on?: string[];

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  port?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  target_port?: number;

  @IsOptional()
  @IsObject()
  environment?: Dictionary<string | number | boolean>;

  @IsOptional()
  @ValidateNested()
  @Type(() => HealthCheckSpec)
  healthcheck?: HealthCheckSpec;
}

export class StaticResponseSpec {
  @IsOptional()
  @IsInt()
  @Min(100)
  @Max(599)
  status?: number;

  @IsOptional()
  @IsString()
  body?: string;
}

export class RouteSpec {
  @IsString()
  path!: string;

  @IsIn(['exact', 'prefix', 'regex'])
  match!: string;

  @IsOptional()
  @IsString()
  upstream?: string;

  @IsOptional()
  @IsString()
  zone?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => StaticResponseSpec)
  static?: StaticResponseSpec;
}

export class RateLimitZoneSpec {
  @IsString()
  name!: string;

  @IsOptional()
  @IsString()
  key?: string;

  @IsInt()
  @Min(1)
  rate!: number;

  @IsInt()
  @Min(1)
  burst!: number;

  @IsOptional()
  @Matches(Slugs.DurationValidator, { message: `idle_timeout ${Slugs.DurationDescription}` })
  idle_timeout?: string;
}

export class ProbeSpec {
  @IsOptional()
  @Matches(/^\//, { message: 'path must start with /' })
  path?: string;

  @IsOptional()
  @Matches(Slugs.DurationValidator, { message: `interval ${Slugs.DurationDescription}` })
  interval?: string;

  @IsOptional()
  @Matches(Slugs.DurationValidator, { message: `timeout ${Slugs.DurationDescription}` })
  timeout?: string;
}

export class UpstreamGroupSpec {
  @IsString()
  name!: string;

  @IsArray()
  @Matches(Slugs.EndpointValidator, { each: true, message: `members ${Slugs.EndpointDescription}` })
  members!: string[];

  @IsOptional()
  @IsInt()
  @Min(0)
  keepalive?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  rise?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => ProbeSpec)
  probe?: ProbeSpec;
}

export class ProxySpec {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  port?: number;

  @IsOptional()
  @Matches(Slugs.DurationValidator, { message: `request_timeout ${Slugs.DurationDescription}` })
  request_timeout?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RateLimitZoneSpec)
  zones: RateLimitZoneSpec[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => UpstreamGroupSpec)
  upstreams: UpstreamGroupSpec[] = [];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RouteSpec)
  routes: RouteSpec[] = [];
}

export class StackSpec {
  @Matches(Slugs.ServiceSlugValidator, { message: `name ${Slugs.ServiceSlugDescription}` })
  name!: string;

  @IsOptional()
  @Matches(Slugs.ServiceSlugValidator, { message: `network ${Slugs.ServiceSlugDescription}` })
  network?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ServiceSpec)
  services: ServiceSpec[] = [];

  @IsOptional()
  @ValidateNested()
  @Type(() => ProxySpec)
  proxy?: ProxySpec;
}
