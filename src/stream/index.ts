export { ByteStream, ByteStreamReader } from "./ByteStream";
