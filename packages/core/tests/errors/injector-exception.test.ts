import { describe, it, expect } from "vitest";
import {
  CircularDependencyError,
  InjectionError,
  InjectorException,
} from "../../src/errors/injector-exception";

describe("InjectionError", () => {
  it("should carry the consumer and an empty path by default", () => {
    // Arrange & Act
    const error = new InjectionError("Cannot inject Printer", "Printer");

    // Assert
    expect(error).toBeInstanceOf(InjectorException);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("InjectionError");
    expect(error.message).toBe("Cannot inject Printer");
    expect(error.consumer).toBe("Printer");
    expect(error.path).toEqual([]);
  });

  it("should append the resolution path to the message", () => {
    // Arrange & Act
    const error = new InjectionError("Cannot inject fullName", "fullName", [
      "addressCard",
      "fullName",
    ]);

    // Assert
    expect(error.message).toBe(
      "Cannot inject fullName (while resolving addressCard → fullName)",
    );
  });
});

describe("CircularDependencyError", () => {
  it("should describe the cycle", () => {
    // Arrange & Act
    const error = new CircularDependencyError(["a", "b", "c", "a"]);

    // Assert
    expect(error).toBeInstanceOf(InjectorException);
    expect(error.name).toBe("CircularDependencyError");
    expect(error.cycle).toEqual(["a", "b", "c", "a"]);
    expect(error.message).toBe("Circular dependency detected: a → b → c → a");
  });
});
