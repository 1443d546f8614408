import { allAttributes, attributeNames, attributeSpec, encodeAttributes, singleAttribute } from "./attributes";

describe("encodeAttributes", () => {
  it("sends null for all attributes", () => {
    expect(encodeAttributes(allAttributes())).toBeNull();
  });

  it("sends a bare name for a single attribute", () => {
    expect(encodeAttributes(singleAttribute("uid"))).toBe("uid");
  });

  it("maps every mode to its wire value", () => {
    const selection = attributeSpec({ uid: "single", mail: "all", jpegPhoto: "base64", manager: "raw" });

    expect(encodeAttributes(selection)).toEqual({ uid: 1, mail: "*", jpegPhoto: "b64", manager: "raw" });
  });
});

describe("attributeNames", () => {
  it("lists the requested names", () => {
    expect(attributeNames(allAttributes())).toEqual([]);
    expect(attributeNames(singleAttribute("uid"))).toEqual(["uid"]);
    expect(attributeNames(attributeSpec({ uid: "single", mail: "all" }))).toEqual(["uid", "mail"]);
  });
});
