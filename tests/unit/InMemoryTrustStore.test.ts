import InMemoryTrustStore from "../mocks/InMemoryTrustStore.js";
import { createTrustStoreContractTests } from "../shared/ITrustStore.contract.js";

createTrustStoreContractTests("InMemoryTrustStore", () => new InMemoryTrustStore());
