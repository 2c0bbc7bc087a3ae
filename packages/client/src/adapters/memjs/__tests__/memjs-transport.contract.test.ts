import { describeTransportContract } from "../../../ports/__tests__/transport.contract"
import { FakeMemjsClient } from "../../../tests/utils/fake-memjs-client"
import { MemjsTransport } from "../memjs-transport"

describeTransportContract("MemjsTransport", () => new MemjsTransport(new FakeMemjsClient()))
