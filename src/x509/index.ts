export * from "./algorithm.js";
export * from "./certificate.js";
export * from "./cri-attributes.js";
export * from "./crl.js";
export * from "./csr.js";
export * from "./extensions/index.js";
export * from "./fields.js";
export * from "./name.js";
export * from "./oid-registry.js";
export * from "./pem.js";
export * from "./time.js";
export * from "./validity.js";
