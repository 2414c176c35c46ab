import "reflect-metadata";
import { describe, it, expect } from "vitest";
import { SetMetadata } from "../../src/decorators/metadata";
import { CUSTOM_METADATA } from "../../src/metadata/constants";
import { getClassMetadata, getMethodMetadata } from "../../src/di/registry";

describe("@SetMetadata", () => {
  it("should store a key-value pair at class level", () => {
    // Arrange & Act
    @SetMetadata("scope", "billing")
    class InvoicePrinter {}

    // Assert
    const meta: Record<string, unknown> = Reflect.getOwnMetadata(
      CUSTOM_METADATA,
      InvoicePrinter,
    );
    expect(meta).toEqual({ scope: "billing" });
  });

  it("should store method attributes on the declaring class", () => {
    // Arrange & Act
    class BillingModule {
      @SetMetadata("format", "string")
      phoneNumber() {}
    }

    // Assert
    const meta: Record<string, unknown> = Reflect.getOwnMetadata(
      CUSTOM_METADATA,
      BillingModule,
      "phoneNumber",
    );
    expect(meta).toEqual({ format: "string" });
  });

  it("should accumulate multiple @SetMetadata on the same target", () => {
    // Arrange & Act
    @SetMetadata("scope", "billing")
    @SetMetadata("version", 2)
    class InvoicePrinter {}

    // Assert
    expect(getClassMetadata(InvoicePrinter)).toEqual({ scope: "billing", version: 2 });
  });

  it("should keep class and method metadata independent", () => {
    // Arrange & Act
    @SetMetadata("scope", "billing")
    class InvoicePrinter {
      @SetMetadata("format", "string")
      setPhone() {}
    }

    // Assert
    expect(getClassMetadata(InvoicePrinter)).toEqual({ scope: "billing" });
    expect(getMethodMetadata(InvoicePrinter, "setPhone")).toEqual({ format: "string" });
  });

  it("should keep a parent's method attributes off a subclass", () => {
    // Arrange & Act
    class BaseModule {
      @SetMetadata("format", "number")
      phoneNumber() {}
    }
    class DerivedModule extends BaseModule {
      @SetMetadata("format", "string")
      override phoneNumber() {}
    }

    // Assert
    expect(getMethodMetadata(BaseModule, "phoneNumber")).toEqual({ format: "number" });
    expect(getMethodMetadata(DerivedModule, "phoneNumber")).toEqual({ format: "string" });
  });

  it("should reject static methods", () => {
    // Arrange
    const decorate = () => {
      class Holder {
        @SetMetadata("format", "string")
        static phoneNumber() {}
      }
      return Holder;
    };

    // Act & Assert
    expect(decorate).toThrow("@SetMetadata() cannot be applied to static member phoneNumber");
  });

  it("should reject symbol-named methods", () => {
    // Arrange
    const key = Symbol("phone");
    const decorate = () => {
      class Holder {
        @SetMetadata("format", "string")
        [key]() {}
      }
      return Holder;
    };

    // Act & Assert
    expect(decorate).toThrow(TypeError);
  });

  it("should read an empty record for undecorated targets", () => {
    // Arrange
    class Plain {
      run() {}
    }

    // Act & Assert
    expect(getClassMetadata(Plain)).toEqual({});
    expect(getMethodMetadata(Plain, "run")).toEqual({});
  });
});
