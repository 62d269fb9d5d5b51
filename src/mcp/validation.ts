import { z } from 'zod';

const appName = z
  .string()
  .min(1)
  .max(100)
  .describe('App name or project title; it is slugified ("My App" -> "my_app")');

export const OpenAppSchema = z.object({
  name: appName,
});

export const StopAppSchema = z.object({
  name: appName,
});

export const RestartAppSchema = z.object({
  name: appName,
});

export const ReleaseAppSchema = z.object({
  name: appName,
});

export const RefreshHealthSchema = z.object({
  name: appName.optional(),
});

export const ListAppsSchema = z.object({});

export const HealthSnapshotSchema = z.object({});

export const CollectGarbageSchema = z.object({});
