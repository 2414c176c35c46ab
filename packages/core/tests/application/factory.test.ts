import "reflect-metadata";
import { describe, it, expect, vi } from "vitest";
import { InjectorFactory } from "../../src/application/factory";
import { Injector } from "../../src/di/injector";
import { Provide } from "../../src/decorators/provide";
import { Injectable } from "../../src/decorators/injectable";
import { CircularDependencyError } from "../../src/errors/injector-exception";

// ── Fixtures ──────────────────────────────────────────────────────────────────

const connect = vi.fn(() => ({ connected: true }));

class StorageModule {
  @Provide()
  databaseUrl() {
    return "postgres://localhost/test";
  }

  @Provide("databaseUrl")
  connection(databaseUrl: string) {
    connect();
    return { url: databaseUrl, connected: true };
  }
}

@Injectable("connection")
class Repository {
  constructor(public connection: { url: string; connected: boolean }) {}
}

// ── Tests ─────────────────────────────────────────────────────────────────────

describe("InjectorFactory.create", () => {
  it("should return an Injector over the given modules", () => {
    // Arrange & Act
    const injector = InjectorFactory.create([new StorageModule()]);

    // Assert
    expect(injector).toBeInstanceOf(Injector);
    expect(injector.create(Repository).connection.url).toBe("postgres://localhost/test");
  });

  it("should register interceptors in order before resolution", () => {
    // Arrange
    const injector = InjectorFactory.create([new StorageModule()], {
      interceptors: [
        (_attrs, deps) =>
          "databaseUrl" in deps ? { ...deps, databaseUrl: `${String(deps.databaseUrl)}?a` } : deps,
        (_attrs, deps) =>
          "databaseUrl" in deps ? { ...deps, databaseUrl: `${String(deps.databaseUrl)}&b` } : deps,
      ],
    });

    // Act
    const repository = injector.create(Repository);

    // Assert
    expect(repository.connection.url).toBe("postgres://localhost/test?a&b");
  });

  it("should preload every resource when asked to", () => {
    // Arrange
    connect.mockClear();

    // Act
    const injector = InjectorFactory.create([new StorageModule()], { preload: true });

    // Assert
    expect(connect).toHaveBeenCalledTimes(1);
    expect(injector.isResolved("databaseUrl")).toBe(true);
    expect(injector.isResolved("connection")).toBe(true);
  });

  it("should preload only the named resources", () => {
    // Arrange & Act
    const injector = InjectorFactory.create([new StorageModule()], {
      preload: ["databaseUrl"],
    });

    // Assert
    expect(injector.isResolved("databaseUrl")).toBe(true);
    expect(injector.isResolved("connection")).toBe(false);
  });

  it("should surface cycles from the injector", () => {
    // Arrange
    class LoopModule {
      @Provide("loop")
      loop(_loop: unknown) {
        return null;
      }
    }

    // Act & Assert
    expect(() => InjectorFactory.create([new LoopModule()])).toThrow(CircularDependencyError);
  });
});
